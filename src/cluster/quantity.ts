const SUFFIXES: Record<string, number> = {
  "": 1,
  k: 1e3,
  M: 1e6,
  G: 1e9,
  T: 1e12,
  P: 1e15,
  E: 1e18,
  Ki: 2 ** 10,
  Mi: 2 ** 20,
  Gi: 2 ** 30,
  Ti: 2 ** 40,
  Pi: 2 ** 50,
  Ei: 2 ** 60,
};

const QUANTITY_PATTERN = /^(\d+(?:\.\d+)?)(Ki|Mi|Gi|Ti|Pi|Ei|k|M|G|T|P|E)?$/;

/**
 * Parse a Kubernetes resource quantity ("500Gi", "10G", "1024") into bytes.
 * Returns null for anything else.
 */
export function parseQuantity(quantity: string): number | null {
  const match = QUANTITY_PATTERN.exec(quantity.trim());
  if (!match) return null;
  return Number(match[1]) * SUFFIXES[match[2] ?? ""];
}

export function isQuantity(quantity: string): boolean {
  return parseQuantity(quantity) !== null;
}

/** "10Gi" and "10240Mi" are the same capacity. */
export function sameQuantity(a: string, b: string): boolean {
  const left = parseQuantity(a);
  const right = parseQuantity(b);
  return left !== null && right !== null ? left === right : a === b;
}
