import { InvalidArgumentError } from "commander";

/**
 * Commander argument parsers. A bad value is reported by commander
 * with the option name and usage.
 */

export function parseId(value: string): number {
  if (!/^\d+$/.test(value.trim()) || Number(value) <= 0) {
    throw new InvalidArgumentError("Expected a positive integer ID.");
  }
  return Number(value);
}

export function parseCount(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return Number(value);
}

export function parsePositive(value: string): number {
  const count = parseCount(value);
  if (count < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return count;
}

export function parseInteger(value: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new InvalidArgumentError("Expected an integer.");
  }
  return Number(value);
}
