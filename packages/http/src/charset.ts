export const supportedCharsets = ['utf-8', 'utf-16le', 'iso-8859-1', 'us-ascii'] as const;

export type Charset = (typeof supportedCharsets)[number];

const CHARSET_ALIASES: Readonly<Record<string, Charset>> = {
  'utf-8': 'utf-8',
  utf8: 'utf-8',
  'utf-16le': 'utf-16le',
  utf16le: 'utf-16le',
  'iso-8859-1': 'iso-8859-1',
  latin1: 'iso-8859-1',
  'us-ascii': 'us-ascii',
  ascii: 'us-ascii'
};

const BUFFER_ENCODINGS: Readonly<Record<Charset, BufferEncoding>> = {
  'utf-8': 'utf8',
  'utf-16le': 'utf16le',
  'iso-8859-1': 'latin1',
  'us-ascii': 'ascii'
};

export const resolveCharset = (name: string): Charset | undefined => CHARSET_ALIASES[name.trim().toLowerCase()];

export const encodeText = (text: string, charset: Charset) => Buffer.from(text, BUFFER_ENCODINGS[charset]);

export const decodeText = (bytes: Uint8Array, charset: Charset) =>
  Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString(BUFFER_ENCODINGS[charset]);
