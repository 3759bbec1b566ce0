/**
 * Values carried by facts and metrics. Integers and floats share `number`;
 * callers that care tell them apart with `Number.isInteger`.
 */
export type FactValue =
  | boolean
  | number
  | string
  | null
  | FactValue[]
  | { [key: string]: FactValue };

export type FactObject = { [key: string]: FactValue };

/**
 * Assigns `key` as an own enumerable property. Plain assignment would treat
 * `"__proto__"` as the prototype setter and lose the value.
 */
export function setOwn<T>(target: Record<string, T>, key: string, value: T): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}

export function isFactObject(value: FactValue): value is FactObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Converts an arbitrary parsed value into a FactValue.
 * Returns undefined when some part of it has no FactValue representation.
 */
export function toFactValue(value: unknown): FactValue | undefined {
  if (value === null) return null;

  switch (typeof value) {
    case "boolean":
    case "string":
      return value;
    case "number":
      return Number.isFinite(value) ? value : undefined;
    case "object": {
      if (Array.isArray(value)) {
        const items: FactValue[] = [];
        for (const item of value) {
          const converted = toFactValue(item);
          if (converted === undefined) return undefined;
          items.push(converted);
        }
        return items;
      }
      const result: FactObject = {};
      for (const [key, item] of Object.entries(value)) {
        const converted = toFactValue(item);
        if (converted === undefined) return undefined;
        setOwn(result, key, converted);
      }
      return result;
    }
    default:
      return undefined;
  }
}

export function formatValue(value: FactValue): string {
  return typeof value === "string" ? value : JSON.stringify(value);
}
