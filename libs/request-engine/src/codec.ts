import { XMLBuilder, XMLParser, XMLValidator } from 'fast-xml-parser';
import type { ContentMode } from './types';

export const JSON_MEDIA_TYPE = 'application/json';
export const XML_MEDIA_TYPE = 'application/xml';
export const FORM_MEDIA_TYPE = 'application/x-www-form-urlencoded';

const encoder = new TextEncoder();
const decoder = new TextDecoder();

export interface ContentCodec {
  readonly mode: ContentMode;
  /** Media type advertised in Accept / Content-Type, if the mode has one. */
  readonly mediaType?: string;
  encode(model: unknown): Uint8Array;
  decode(bytes: Uint8Array): unknown;
}

const encodeJson = (model: unknown): Uint8Array => {
  const text = JSON.stringify(model);
  // JSON.stringify yields undefined for undefined, functions and symbols
  if (text === undefined) {
    throw new TypeError(`Cannot encode ${typeof model} as JSON`);
  }
  return encoder.encode(text);
};

export const jsonCodec: ContentCodec = {
  mode: 'json',
  mediaType: JSON_MEDIA_TYPE,
  encode: encodeJson,
  decode(bytes) {
    const parsed: unknown = JSON.parse(decoder.decode(bytes));
    return parsed;
  },
};

const XML_OPTIONS = {
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
} as const;

const xmlBuilder = new XMLBuilder({ ...XML_OPTIONS, format: false });
// text stays text; the caller's schema decides what is numeric
const xmlParser = new XMLParser({
  ...XML_OPTIONS,
  ignoreDeclaration: true,
  parseTagValue: false,
  parseAttributeValue: false,
});

/**
 * The model's top-level key is the document's root element:
 * `{ order: { id: 7 } }` encodes to `<order><id>7</id></order>`.
 */
export const xmlCodec: ContentCodec = {
  mode: 'xml',
  mediaType: XML_MEDIA_TYPE,
  encode(model) {
    const xml: string = xmlBuilder.build(model);
    return encoder.encode(xml);
  },
  decode(bytes) {
    const text = decoder.decode(bytes);
    if (!text.trim()) {
      throw new SyntaxError('Empty XML document');
    }
    const validation = XMLValidator.validate(text);
    if (validation !== true) {
      const { msg, line, col } = validation.err;
      throw new SyntaxError(`Invalid XML at ${line}:${col}: ${msg}`);
    }
    const parsed: unknown = xmlParser.parse(text);
    return parsed;
  },
};

/**
 * Strings and bytes pass through untouched, other models are sent as JSON.
 * Responses are always handed back as text.
 */
export const rawCodec: ContentCodec = {
  mode: 'raw',
  encode(model) {
    if (typeof model === 'string') return encoder.encode(model);
    if (model instanceof Uint8Array) return model;
    return encodeJson(model);
  },
  decode(bytes) {
    return decoder.decode(bytes);
  },
};

const CODECS: Record<ContentMode, ContentCodec> = {
  json: jsonCodec,
  xml: xmlCodec,
  raw: rawCodec,
};

export function codecFor(mode: ContentMode): ContentCodec {
  return CODECS[mode];
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const formValue = (value: unknown): string =>
  typeof value === 'object' && value !== null ? JSON.stringify(value) : String(value);

/**
 * Flattens a model into `key=value` pairs named after its JSON fields (so `toJSON`
 * and omitted `undefined` fields behave as they would in a JSON body).
 * Arrays repeat the key, nested objects are sent as JSON text, nulls are dropped.
 */
export function encodeForm(model: unknown): Uint8Array {
  const text = JSON.stringify(model);
  const json: unknown = text === undefined ? undefined : JSON.parse(text);
  if (!isRecord(json)) {
    throw new TypeError('Form-encoded body must be an object');
  }

  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(json)) {
    if (value === null) continue;
    if (Array.isArray(value)) {
      for (const entry of value) {
        if (entry !== null) params.append(key, formValue(entry));
      }
      continue;
    }
    params.append(key, formValue(value));
  }
  return encoder.encode(params.toString());
}
