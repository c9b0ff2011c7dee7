import type { Service } from "../lib/types.js";

/**
 * Split "key=value" into its parts. The value may itself contain "=".
 */
export function parseKeyValue(input: string): [string, string] {
  const index = input.indexOf("=");
  if (index <= 0) {
    throw new Error(`Expected key=value, got "${input}"`);
  }
  return [input.slice(0, index), input.slice(index + 1)];
}

export function parseLimit(input: string): [string, number] {
  const [key, raw] = parseKeyValue(input);
  const value = Number(raw);
  if (raw.trim() === "" || !Number.isSafeInteger(value)) {
    throw new Error(`Limit "${key}" must be an integer, got "${raw}"`);
  }
  return [key, value];
}

export function parseFeature(input: string): [string, boolean] {
  if (!input.includes("=")) return [input, true];

  const [key, raw] = parseKeyValue(input);
  switch (raw.toLowerCase()) {
    case "true":
    case "on":
    case "1":
      return [key, true];
    case "false":
    case "off":
    case "0":
      return [key, false];
    default:
      throw new Error(`Feature "${key}" must be true or false, got "${raw}"`);
  }
}

/**
 * "id" or "id:Display Name"; without a name the id doubles as the name.
 */
export function parseService(input: string): Service {
  const index = input.indexOf(":");
  const id = index === -1 ? input : input.slice(0, index);
  const name = index === -1 ? input : input.slice(index + 1);
  if (!id) {
    throw new Error(`Service id is empty in "${input}"`);
  }
  return { id, name: name || id };
}

/**
 * commander option accumulator for repeatable flags
 */
export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}
