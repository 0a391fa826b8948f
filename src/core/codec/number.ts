import { EncodeError } from "../errors";

/**
 * Decimal (never exponential) text of a finite double, using the shortest
 * digits that round-trip. Non-finite values fall back to `String(n)`.
 */
export function formatDecimal(n: number): string {
  if (!Number.isFinite(n)) return String(n);
  const s = String(n);
  return s.includes("e") ? expandExponent(s) : s;
}

/**
 * JSON text of a float. Always carries a decimal point so that decoding
 * classifies it as a float again.
 */
export function formatFloatJson(n: number): string {
  if (!Number.isFinite(n)) throw new EncodeError(n);
  const d = formatDecimal(n);
  return d.includes(".") ? d : `${d}.0`;
}

function expandExponent(s: string): string {
  const negative = s.startsWith("-");
  const body = negative ? s.slice(1) : s;
  const [mantissa, expText] = body.split("e");
  const exp = parseInt(expText ?? "0", 10);
  const [intPart, fracPart = ""] = (mantissa ?? "").split(".");
  const digits = `${intPart ?? ""}${fracPart}`;
  const point = (intPart ?? "").length + exp;

  let out: string;
  if (point <= 0) {
    out = `0.${"0".repeat(-point)}${digits}`;
  } else if (point >= digits.length) {
    out = `${digits}${"0".repeat(point - digits.length)}`;
  } else {
    out = `${digits.slice(0, point)}.${digits.slice(point)}`;
  }
  return negative ? `-${out}` : out;
}
