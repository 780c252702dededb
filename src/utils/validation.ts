export interface ValidationError {
  field: string;
  message: string;
}

export function isValidPort(port: number): boolean {
  return Number.isInteger(port) && port >= 1024 && port <= 65535;
}

export function isValidDatabaseName(name: string): boolean {
  // PostgreSQL identifier rules
  return /^[a-zA-Z_][a-zA-Z0-9_]*$/.test(name) && name.length <= 63;
}

export function isValidUserName(name: string): boolean {
  return /^[a-zA-Z_][a-zA-Z0-9_]*$/.test(name) && name.length <= 63;
}

export function isValidConnectionTimeout(microseconds: number): boolean {
  return Number.isInteger(microseconds) && microseconds > 0;
}

export function isValidEnvironmentName(name: string): boolean {
  return /^[A-Za-z_][A-Za-z0-9_]*$/.test(name);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads typed fields out of an untrusted document, recording an error for
 * every field of the wrong shape instead of stopping at the first.
 */
export class FieldReader {
  readonly errors: ValidationError[] = [];

  constructor(private readonly prefix = '') {}

  private fail(field: string, message: string): undefined {
    this.errors.push({ field: this.prefix + field, message });
    return undefined;
  }

  nested(field: string): FieldReader {
    return new FieldReader(`${this.prefix}${field}.`);
  }

  /** Merge a nested reader's errors into this one. */
  adopt(reader: FieldReader): void {
    this.errors.push(...reader.errors);
  }

  string(source: Record<string, unknown>, field: string): string | undefined {
    const value = source[field];
    if (value === undefined || value === null) return undefined;
    if (typeof value !== 'string' || value.trim() === '') {
      return this.fail(field, 'Must be a non-empty string');
    }
    return value;
  }

  boolean(source: Record<string, unknown>, field: string): boolean | undefined {
    const value = source[field];
    if (value === undefined || value === null) return undefined;
    if (typeof value !== 'boolean') return this.fail(field, 'Must be true or false');
    return value;
  }

  integer(
    source: Record<string, unknown>,
    field: string,
    isValid: (value: number) => boolean,
    message: string
  ): number | undefined {
    const value = source[field];
    if (value === undefined || value === null) return undefined;
    if (typeof value !== 'number' || !isValid(value)) return this.fail(field, message);
    return value;
  }

  record(source: Record<string, unknown>, field: string): Record<string, unknown> | undefined {
    const value = source[field];
    if (value === undefined || value === null) return undefined;
    if (!isRecord(value)) return this.fail(field, 'Must be a mapping');
    return value;
  }

  stringList(source: Record<string, unknown>, field: string): string[] | undefined {
    const value = source[field];
    if (value === undefined || value === null) return undefined;
    if (!Array.isArray(value)) return this.fail(field, 'Must be a list of strings');
    const strings: string[] = [];
    for (const item of value) {
      if (typeof item !== 'string') return this.fail(field, 'Must be a list of strings');
      strings.push(item);
    }
    return strings;
  }

  /** A mapping of names to strings. Numbers and booleans are stringified. */
  stringMap(source: Record<string, unknown>, field: string): Record<string, string> | undefined {
    const map = this.record(source, field);
    if (map === undefined) return undefined;
    const result: Record<string, string> = {};
    for (const [key, value] of Object.entries(map)) {
      if (typeof value === 'string') {
        result[key] = value;
      } else if (typeof value === 'number' || typeof value === 'boolean') {
        result[key] = String(value);
      } else {
        this.fail(`${field}.${key}`, 'Must be a string');
      }
    }
    return result;
  }

  /** Command line switches: a string value, or `null` for a bare switch. */
  switchMap(source: Record<string, unknown>, field: string): Record<string, string | null> | undefined {
    const map = this.record(source, field);
    if (map === undefined) return undefined;
    const result: Record<string, string | null> = {};
    for (const [key, value] of Object.entries(map)) {
      if (value === null || typeof value === 'string') {
        result[key] = value;
      } else if (typeof value === 'number') {
        result[key] = String(value);
      } else {
        this.fail(`${field}.${key}`, 'Must be a string or null');
      }
    }
    return result;
  }

  check(condition: boolean, field: string, message: string): void {
    if (!condition) this.fail(field, message);
  }
}
