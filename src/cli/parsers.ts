import { InvalidArgumentError } from "commander";

export function parseInteger(value: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new InvalidArgumentError("Expected an integer.");
  }
  return Number.parseInt(value, 10);
}

export function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim().length === 0 || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError("Expected a number.");
  }
  return parsed;
}

export function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

export function collectIntegers(value: string, previous: number[] = []): number[] {
  return [...previous, parseInteger(value)];
}
