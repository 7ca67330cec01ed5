/**
 * Column Type Value Object
 *
 * Engine-neutral column types for the HR schema. Dialect rendering lives in
 * adapters/sql.
 */

export type ColumnType =
  | { kind: "number"; precision: number; scale: number }
  | { kind: "varchar"; length: number }
  | { kind: "date" };

export type ColumnValue = number | string | null;

export function numberType(precision: number, scale = 0): ColumnType {
  return { kind: "number", precision, scale };
}

export function varcharType(length: number): ColumnType {
  return { kind: "varchar", length };
}

export const dateType: ColumnType = { kind: "date" };

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * True for a real calendar date written as YYYY-MM-DD
 */
export function isIsoDate(value: string): boolean {
  const match = ISO_DATE.exec(value);
  if (!match) return false;

  const [, y, m, d] = match;
  const date = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
  return (
    date.getUTCFullYear() === Number(y) &&
    date.getUTCMonth() === Number(m) - 1 &&
    date.getUTCDate() === Number(d)
  );
}

/**
 * Count integer and fractional digits of a finite number.
 * 24000 -> { integer: 5, fraction: 0 }, 0.15 -> { integer: 0, fraction: 2 }
 */
export function countDigits(value: number): { integer: number; fraction: number } {
  const [intPart = "", fracPart = ""] = Math.abs(value).toString().split(".");
  const integer = intPart === "0" ? 0 : intPart.length;
  return { integer, fraction: fracPart.length };
}

/**
 * Round half away from zero on the decimal digits of the value:
 * roundToScale(1.005, 2) -> 1.01, roundToScale(0.1 + 0.2, 2) -> 0.3
 */
export function roundToScale(value: number, scale: number): number {
  const shifted = Math.round(Number(`${Math.abs(value)}e${scale}`));
  return Math.sign(value) * Number(`${shifted}e-${scale}`);
}
