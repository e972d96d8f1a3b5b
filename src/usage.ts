import type { OptionRecord } from "./options/types.js";

/**
 * Renders the help block: description header, then one `--name` entry per
 * option. Names that leave no room before `breakColumn` push their
 * description onto the next line.
 */
export function formatUsage(description: string, options: readonly OptionRecord[], breakColumn: number): string {
  let out = description ? `${description}\n\n` : "";
  out += "OPTIONS:\n\n";

  for (const opt of options) {
    const width = opt.name.length + 4;
    out += `  --${opt.name}`;
    if (width < breakColumn) {
      out += " ".repeat(breakColumn - width);
    } else {
      out += "\n" + " ".repeat(breakColumn);
    }
    out += `${opt.description}\n`;
  }
  return out;
}
