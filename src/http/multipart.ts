import { invalidRequest } from '../api/errors';

export interface TextField {
  name: string;
  isFile: false;
  value: string;
}

export interface FileField {
  name: string;
  isFile: true;
  value: Buffer;
  filename?: string;
  contentType?: string;
}

export type FormField = TextField | FileField;

export type FormFields = Map<string, FormField>;

const CRLF = Buffer.from('\r\n', 'ascii');
const HEADER_SEPARATOR = Buffer.from('\r\n\r\n', 'ascii');

function stripQuotes(value: string): string {
  return value.replace(/^"+/, '').replace(/"+$/, '');
}

/**
 * Pulls the `boundary` parameter out of a multipart Content-Type header.
 * Returns null when the parameter is missing or empty.
 */
export function extractBoundary(contentType: string): string | null {
  for (const rawParam of contentType.split(';')) {
    const param = rawParam.trim();
    if (param.toLowerCase().startsWith('boundary=')) {
      const boundary = stripQuotes(param.slice('boundary='.length).trim());
      return boundary === '' ? null : boundary;
    }
  }
  return null;
}

function splitBuffer(body: Buffer, delimiter: Buffer): Buffer[] {
  const parts: Buffer[] = [];
  let start = 0;
  let index = body.indexOf(delimiter, start);
  while (index !== -1) {
    parts.push(body.subarray(start, index));
    start = index + delimiter.length;
    index = body.indexOf(delimiter, start);
  }
  parts.push(body.subarray(start));
  return parts;
}

function isClosingMarker(segment: Buffer): boolean {
  return segment.toString('latin1').trim() === '--';
}

interface PartHeaders {
  name: string | null;
  filename: string | null;
  hasFilename: boolean;
  contentType?: string;
}

function parsePartHeaders(headerBlock: string): PartHeaders {
  const headers: PartHeaders = { name: null, filename: null, hasFilename: false };

  for (const line of headerBlock.split('\r\n')) {
    const lower = line.toLowerCase();
    if (lower.startsWith('content-type:')) {
      headers.contentType = line.slice('content-type:'.length).trim();
      continue;
    }
    if (!lower.startsWith('content-disposition:')) {
      continue;
    }
    for (const rawItem of line.split(';')) {
      const item = rawItem.trim();
      if (item.startsWith('name=')) {
        headers.name = stripQuotes(item.slice('name='.length));
      } else if (item.startsWith('filename=')) {
        headers.hasFilename = true;
        headers.filename = stripQuotes(item.slice('filename='.length));
      }
    }
  }

  return headers;
}

/**
 * Decodes a fully buffered multipart/form-data body.
 *
 * Parts without a header/content separator or without a `name` are skipped.
 * A part declaring `filename=` keeps its raw bytes; any other part is decoded
 * as UTF-8 (invalid sequences become U+FFFD) and trimmed. When a name repeats,
 * the last part wins.
 */
export function parseMultipart(body: Buffer, contentType: string): FormFields {
  const boundary = extractBoundary(contentType);
  if (!boundary) {
    throw invalidRequest('No boundary found in Content-Type');
  }

  const delimiter = Buffer.from(`--${boundary}`, 'utf8');
  const fields: FormFields = new Map();

  for (const rawSegment of splitBuffer(body, delimiter)) {
    let segment = rawSegment;
    if (segment.length === 0 || isClosingMarker(segment)) {
      continue;
    }

    if (segment.subarray(0, CRLF.length).equals(CRLF)) {
      segment = segment.subarray(CRLF.length);
    }
    if (segment.length >= CRLF.length && segment.subarray(segment.length - CRLF.length).equals(CRLF)) {
      segment = segment.subarray(0, segment.length - CRLF.length);
    }

    const separatorAt = segment.indexOf(HEADER_SEPARATOR);
    if (separatorAt === -1) {
      continue;
    }

    const headers = parsePartHeaders(segment.subarray(0, separatorAt).toString('utf8'));
    if (!headers.name) {
      continue;
    }

    const content = segment.subarray(separatorAt + HEADER_SEPARATOR.length);

    if (headers.hasFilename) {
      const field: FileField = {
        name: headers.name,
        isFile: true,
        value: Buffer.from(content),
      };
      if (headers.filename) field.filename = headers.filename;
      if (headers.contentType) field.contentType = headers.contentType;
      fields.set(headers.name, field);
    } else {
      fields.set(headers.name, {
        name: headers.name,
        isFile: false,
        value: content.toString('utf8').trim(),
      });
    }
  }

  return fields;
}
