type WithMessage = { message: string };

export function hasMessage(x: unknown): x is WithMessage {
  if (typeof x !== "object" || x === null) return false;

  const obj = x as Record<string, unknown>;
  return typeof obj.message === "string";
}

export function isPlainObject(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}
