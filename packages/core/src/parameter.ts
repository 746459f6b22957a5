/** values accepted when building parameters from an already parsed object */
export type ParameterRecord = Record<
  string,
  string | readonly string[] | undefined
>;

/**
 * ordered key to value(s) mapping of query-string or form-body parameters
 *
 * a key that appears more than once has no unique value, which OAuth treats
 * the same as a missing parameter
 */
export class NormalizedParameter {
  readonly #entries: ReadonlyArray<readonly [string, string]>;

  /**
   * @param entries decoded key/value pairs in their original order
   */
  constructor(entries: Iterable<readonly [string, string]> = []) {
    this.#entries = Array.from(entries, ([key, value]) => [key, value] as const);
  }

  /**
   * builds parameters from an object produced by a querystring or form parser
   * @param record parsed parameters where repeated keys hold arrays
   * @returns normalized parameters preserving key order
   */
  public static fromRecord(record: ParameterRecord): NormalizedParameter {
    const entries: Array<readonly [string, string]> = [];

    for (const [key, value] of Object.entries(record)) {
      if (typeof value === 'string') {
        entries.push([key, value]);
      } else if (value) {
        for (const item of value) {
          entries.push([key, item]);
        }
      }
    }

    return new NormalizedParameter(entries);
  }

  /** number of key/value pairs, counting repeats */
  public get size(): number {
    return this.#entries.length;
  }

  /**
   * gets the unique value of a parameter
   * @param key parameter name
   * @returns the value, or undefined when the key is absent or repeated
   */
  public get(key: string): string | undefined {
    const values = this.getAll(key);

    return values.length === 1 ? values[0] : undefined;
  }

  /**
   * @param key parameter name
   * @returns every value of the key in order of appearance
   */
  public getAll(key: string): string[] {
    return this.#entries
      .filter(([name]) => name === key)
      .map(([, value]) => value);
  }

  /**
   * @param key parameter name
   * @returns true when the key appears at least once
   */
  public has(key: string): boolean {
    return this.#entries.some(([name]) => name === key);
  }

  /** @returns the key/value pairs in order */
  public entries(): Array<[string, string]> {
    return this.#entries.map(([key, value]) => [key, value]);
  }

  /** @returns keys mapped to their unique value, dropping ambiguous keys */
  public toRecord(): Record<string, string> {
    const record: Record<string, string> = {};

    for (const [key] of this.#entries) {
      const value = this.get(key);
      if (value !== undefined) {
        record[key] = value;
      }
    }

    return record;
  }
}

/**
 * parses `application/x-www-form-urlencoded` text
 * @param text raw query string or form body, without a leading `?`
 * @returns the parameters, or undefined when the percent-encoding is malformed
 * @example
 * ```typescript
 * parseUrlEncoded('code=abc&state=xyz')?.get('code'); // 'abc'
 * parseUrlEncoded('code=%E0%A4%A'); // undefined
 * ```
 */
export function parseUrlEncoded(text: string): NormalizedParameter | undefined {
  const entries: Array<readonly [string, string]> = [];

  for (const segment of text.split('&')) {
    if (!segment) {
      continue;
    }

    const separator = segment.indexOf('=');
    const rawKey = separator === -1 ? segment : segment.slice(0, separator);
    const rawValue = separator === -1 ? '' : segment.slice(separator + 1);

    const key = decodeComponent(rawKey);
    const value = decodeComponent(rawValue);
    if (key === undefined || value === undefined) {
      return undefined;
    }

    entries.push([key, value]);
  }

  return new NormalizedParameter(entries);
}

/**
 * @param component a single encoded key or value
 * @returns the decoded text, or undefined on malformed percent-encoding
 */
function decodeComponent(component: string): string | undefined {
  try {
    return decodeURIComponent(component.replace(/\+/g, ' '));
  } catch {
    return undefined;
  }
}
