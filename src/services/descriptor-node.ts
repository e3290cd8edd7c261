import { ValidationError } from "../core/errors.ts";
import { isRecord } from "../utils/guards.ts";

/**
 * Typed access to one mapping of the descriptor. Every accessor throws a
 * `ValidationError` naming the offending path.
 */
export class DescriptorNode {
  private constructor(
    private readonly value: Record<string, unknown>,
    readonly path: string,
    private readonly document: string,
  ) {}

  /**
   * @param document - What is being read, for error messages ("cluster descriptor")
   */
  static from(value: unknown, path: string, document: string): DescriptorNode {
    if (!isRecord(value)) {
      throw invalid(document, path, "a mapping");
    }
    return new DescriptorNode(value, path, document);
  }

  has(key: string): boolean {
    return this.value[key] !== undefined && this.value[key] !== null;
  }

  string(key: string, fallback?: string): string {
    const value = this.value[key] ?? fallback;
    if (typeof value === "number") {
      return String(value);
    }
    if (typeof value !== "string" || value.trim() === "") {
      throw this.invalid(key, "a non-empty string");
    }
    return value;
  }

  number(key: string, fallback?: number): number {
    const value = this.value[key] ?? fallback;
    if (typeof value !== "number" || !Number.isFinite(value) || value < 0) {
      throw this.invalid(key, "a non-negative number");
    }
    return value;
  }

  boolean(key: string, fallback?: boolean): boolean {
    const value = this.value[key] ?? fallback;
    if (typeof value !== "boolean") {
      throw this.invalid(key, "a boolean");
    }
    return value;
  }

  oneOf<T extends string>(key: string, allowed: readonly T[], fallback?: T): T {
    const value = this.value[key] ?? fallback;
    const match = allowed.find((candidate) => candidate === value);
    if (match === undefined) {
      throw this.invalid(key, `one of ${allowed.join(", ")}`);
    }
    return match;
  }

  child(key: string): DescriptorNode {
    return DescriptorNode.from(this.value[key], this.at(key), this.document);
  }

  /** Missing lists are empty. */
  list(key: string): DescriptorNode[] {
    const value = this.value[key];
    if (value === undefined || value === null) {
      return [];
    }
    if (!Array.isArray(value)) {
      throw this.invalid(key, "a list");
    }
    return value.map((item, index) => DescriptorNode.from(item, `${this.at(key)}[${index}]`, this.document));
  }

  /** Keys of this mapping, for free-form string maps. */
  stringMap(key: string): Record<string, string> {
    if (!this.has(key)) {
      return {};
    }
    const child = this.child(key);
    return Object.fromEntries(child.keys().map((name) => [name, child.string(name)]));
  }

  keys(): string[] {
    return Object.keys(this.value);
  }

  private invalid(key: string, expected: string): ValidationError {
    return invalid(this.document, this.at(key), expected);
  }

  private at(key: string): string {
    return this.path === "" ? key : `${this.path}.${key}`;
  }
}

function invalid(document: string, path: string, expected: string): ValidationError {
  return new ValidationError(`Invalid ${document}: ${path === "" ? "root" : path} must be ${expected}`);
}
