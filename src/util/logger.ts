export type LogLevel = "silent" | "error" | "info" | "debug";

const LEVEL_RANK: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  info: 2,
  debug: 3,
};

export type LogSink = (line: string) => void;

/**
 * Leveled logger. Output goes to stderr so it never mixes with a program's
 * own stdout; tests pass a sink to capture lines instead.
 */
export class Logger {
  constructor(
    private level: LogLevel = "info",
    private sink: LogSink = (line) => process.stderr.write(line + "\n"),
  ) {}

  getLevel(): LogLevel {
    return this.level;
  }

  setLevel(level: LogLevel) {
    this.level = level;
  }

  error(msg: string) {
    this.write("error", msg);
  }

  info(msg: string) {
    this.write("info", msg);
  }

  debug(msg: string) {
    this.write("debug", msg);
  }

  private write(level: Exclude<LogLevel, "silent">, msg: string) {
    if (LEVEL_RANK[this.level] < LEVEL_RANK[level]) return;
    this.sink(`[${new Date().toISOString()}] ${level.toUpperCase()} ${msg}`);
  }
}
