import {parseMediaType, type MediaType} from './mediaType';

const HTTP_HEADER_NAME_REGEX = /^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/u;

export type HeaderValue = string | readonly string[] | undefined;

export type HeadersInit = Readonly<Record<string, HeaderValue>> | Iterable<readonly [string, string]>;

const isIterableInit = (init: HeadersInit): init is Iterable<readonly [string, string]> =>
  Symbol.iterator in init;

export const normalizeHeaderName = (name: string) => {
  const normalized = name.trim().toLowerCase();
  if (!HTTP_HEADER_NAME_REGEX.test(normalized)) {
    throw new TypeError(`Invalid header name: ${name}`);
  }

  return normalized;
};

/** Case-insensitive, multi-valued header collection. */
export class HttpHeaders {
  private readonly values = new Map<string, string[]>();

  public constructor(init?: HeadersInit) {
    if (!init) {
      return;
    }

    if (isIterableInit(init)) {
      for (const [name, value] of init) {
        this.append(name, value);
      }
      return;
    }

    for (const [name, value] of Object.entries(init)) {
      if (value === undefined) {
        continue;
      }

      if (typeof value === 'string') {
        this.append(name, value);
        continue;
      }

      for (const item of value) {
        this.append(name, item);
      }
    }
  }

  private append(name: string, value: string) {
    const key = normalizeHeaderName(name);
    const existing = this.values.get(key);
    if (existing) {
      existing.push(value.trim());
      return;
    }

    this.values.set(key, [value.trim()]);
  }

  public has(name: string) {
    return this.values.has(name.toLowerCase());
  }

  /** All values of a header joined with ", ", or undefined when absent. */
  public get(name: string): string | undefined {
    return this.values.get(name.toLowerCase())?.join(', ');
  }

  public first(name: string): string | undefined {
    return this.values.get(name.toLowerCase())?.[0];
  }

  public getAll(name: string): string[] {
    return [...(this.values.get(name.toLowerCase()) ?? [])];
  }

  public names(): string[] {
    return [...this.values.keys()];
  }

  public contentType(): MediaType | undefined {
    const raw = this.first('content-type');
    return raw === undefined ? undefined : parseMediaType(raw);
  }

  public contentLength(): number | undefined {
    const raw = this.first('content-length');
    if (raw === undefined || !/^\d+$/u.test(raw)) {
      return undefined;
    }

    const parsed = Number.parseInt(raw, 10);
    return Number.isSafeInteger(parsed) ? parsed : undefined;
  }

  public toRecord(): Record<string, string> {
    return Object.fromEntries([...this.values.entries()].map(([name, values]) => [name, values.join(', ')]));
  }
}
