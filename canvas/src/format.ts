const DIGITS = 3;

export function fmt(value: number, digits = DIGITS): string {
  return String(Number(value.toFixed(digits)));
}

export function escapeAttr(value: string): string {
  return value.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;").replace(/"/g, "&quot;");
}
