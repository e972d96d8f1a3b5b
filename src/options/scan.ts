const INTEGER_RE = /^[+-]?\d+$/;
const FLOAT_RE = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/** Splits a raw argv slot on ASCII whitespace; other spaces stay inside a piece. */
export function splitPieces(raw: string): string[] {
  return raw.split(/[ \t\n\v\f\r]+/).filter((p) => p.length > 0);
}

export function parseInteger(piece: string): number | undefined {
  if (!INTEGER_RE.test(piece)) return undefined;
  const n = Number(piece);
  return Number.isSafeInteger(n) ? n : undefined;
}

export function parseFloatStrict(piece: string): number | undefined {
  if (!FLOAT_RE.test(piece)) return undefined;
  const n = Number(piece);
  return Number.isFinite(n) ? n : undefined;
}

export type PieceParser<T> = (piece: string) => { ok: true; value: T } | { ok: false; issues: string[] };

export type ScanOutcome<T> =
  | { status: "empty" }
  | { status: "invalid"; issues: string[] }
  | { status: "too_many" }
  | { status: "one"; value: T };

/**
 * Scans a raw slot as exactly one value. Pieces are parsed left to right and
 * the first invalid piece stops the scan, so "1 x" is invalid while "1 2" is
 * too many.
 */
export function scanOne<T>(raw: string, parsePiece: PieceParser<T>): ScanOutcome<T> {
  const pieces = splitPieces(raw);
  if (pieces.length === 0) return { status: "empty" };

  const values: T[] = [];
  for (const piece of pieces) {
    const res = parsePiece(piece);
    if (!res.ok) return { status: "invalid", issues: res.issues };
    values.push(res.value);
  }
  if (values.length > 1) return { status: "too_many" };
  return { status: "one", value: values[0] };
}
