/**
 * Media type values (`type/subtype; name=value`) used to pick chunk decoders.
 */

import { InvalidArgumentError } from "../errors.js";

const TOKEN = /^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/;

export class MediaType {
  static readonly WILDCARD = new MediaType("*", "*");
  static readonly APPLICATION_JSON = new MediaType("application", "json");
  static readonly APPLICATION_OCTET_STREAM = new MediaType("application", "octet-stream");
  static readonly TEXT_PLAIN = new MediaType("text", "plain");

  readonly type: string;
  readonly subtype: string;
  readonly parameters: ReadonlyMap<string, string>;

  constructor(type: string, subtype: string, parameters?: Iterable<[string, string]>) {
    if (!TOKEN.test(type) || !TOKEN.test(subtype)) {
      throw new InvalidArgumentError(`Invalid media type: ${type}/${subtype}`);
    }
    this.type = type.toLowerCase();
    this.subtype = subtype.toLowerCase();
    const params = new Map<string, string>();
    for (const [name, value] of parameters ?? []) {
      if (!TOKEN.test(name)) {
        throw new InvalidArgumentError(`Invalid media type parameter name: ${name}`);
      }
      params.set(name.toLowerCase(), value);
    }
    this.parameters = params;
  }

  /**
   * Parse a `Content-Type` style value.
   *
   * @throws InvalidArgumentError when the text is not a media type
   */
  static valueOf(text: string): MediaType {
    const [essence, ...rest] = splitParameters(text);
    const slash = essence.indexOf("/");
    if (slash < 0) {
      throw new InvalidArgumentError(`Invalid media type: "${text}"`);
    }
    const parameters: [string, string][] = [];
    for (const part of rest) {
      if (part === "") continue;
      const eq = part.indexOf("=");
      if (eq <= 0) {
        throw new InvalidArgumentError(`Invalid media type parameter "${part}" in "${text}"`);
      }
      parameters.push([part.slice(0, eq).trim(), unquote(part.slice(eq + 1).trim(), text)]);
    }
    return new MediaType(essence.slice(0, slash).trim(), essence.slice(slash + 1).trim(), parameters);
  }

  get charset(): string | undefined {
    return this.parameters.get("charset");
  }

  get isWildcardType(): boolean {
    return this.type === "*";
  }

  get isWildcardSubtype(): boolean {
    return this.subtype === "*";
  }

  withCharset(charset: string): MediaType {
    const params = new Map(this.parameters);
    params.set("charset", charset);
    return new MediaType(this.type, this.subtype, params);
  }

  /**
   * Check whether the two types can describe the same content, honouring
   * `*` wildcards on either side. Parameters are ignored.
   */
  isCompatible(other: MediaType): boolean {
    if (this.isWildcardType || other.isWildcardType) return true;
    if (this.type !== other.type) return false;
    return this.isWildcardSubtype || other.isWildcardSubtype || this.subtype === other.subtype;
  }

  equals(other: MediaType): boolean {
    if (this.type !== other.type || this.subtype !== other.subtype) return false;
    if (this.parameters.size !== other.parameters.size) return false;
    for (const [name, value] of this.parameters) {
      if (other.parameters.get(name) !== value) return false;
    }
    return true;
  }

  toString(): string {
    let result = `${this.type}/${this.subtype}`;
    for (const [name, value] of this.parameters) {
      result += `; ${name}=${TOKEN.test(value) ? value : quote(value)}`;
    }
    return result;
  }
}

/** Split on `;` outside of quoted strings. */
function splitParameters(text: string): string[] {
  const parts: string[] = [];
  let current = "";
  let quoted = false;
  for (let i = 0; i < text.length; i++) {
    const c = text[i];
    if (quoted) {
      current += c;
      if (c === "\\" && i + 1 < text.length) {
        current += text[++i];
      } else if (c === '"') {
        quoted = false;
      }
    } else if (c === '"') {
      quoted = true;
      current += c;
    } else if (c === ";") {
      parts.push(current.trim());
      current = "";
    } else {
      current += c;
    }
  }
  parts.push(current.trim());
  return parts;
}

function unquote(value: string, text: string): string {
  if (!value.startsWith('"')) return value;
  if (value.length < 2 || !value.endsWith('"')) {
    throw new InvalidArgumentError(`Unterminated quoted string in media type "${text}"`);
  }
  return value.slice(1, -1).replace(/\\(.)/g, "$1");
}

function quote(value: string): string {
  return `"${value.replace(/(["\\])/g, "\\$1")}"`;
}
