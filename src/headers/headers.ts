import type { Header, Headers } from '../types.js';

function matches(header: Header, name: string): boolean {
  return header.name.toLowerCase() === name.toLowerCase();
}

export function getHeaderValues(headers: Headers, name: string): string[] {
  return headers
    .filter((header) => matches(header, name))
    .map((header) => header.value);
}

export function getHeader(headers: Headers, name: string): string | undefined {
  return headers.find((header) => matches(header, name))?.value;
}

export function hasHeader(headers: Headers, name: string): boolean {
  return headers.some((header) => matches(header, name));
}

/**
 * Returns a copy of `headers` where `name` occurs once. The first match keeps
 * its position and original spelling; a header not present yet is appended.
 */
export function setHeader(headers: Headers, name: string, value: string): Headers {
  const result: Headers = [];
  let replaced = false;

  for (const header of headers) {
    if (!matches(header, name)) {
      result.push(header);
    } else if (!replaced) {
      result.push({ name: header.name, value });
      replaced = true;
    }
  }

  if (!replaced) {
    result.push({ name, value });
  }

  return result;
}
