/**
 * Case-insensitive helpers for plain header records
 */

/**
 * Find the stored key for a header name, ignoring case
 */
function findKey(headers: Record<string, string>, name: string): string | undefined {
  const lower = name.toLowerCase();
  return Object.keys(headers).find((key) => key.toLowerCase() === lower);
}

export function getHeader(headers: Record<string, string>, name: string): string | undefined {
  const key = findKey(headers, name);
  return key === undefined ? undefined : headers[key];
}

export function hasHeader(headers: Record<string, string>, name: string): boolean {
  return findKey(headers, name) !== undefined;
}

/**
 * Set a header, replacing any existing spelling of the same name
 */
export function setHeader(headers: Record<string, string>, name: string, value: string): void {
  const key = findKey(headers, name);
  if (key !== undefined && key !== name) {
    delete headers[key];
  }
  headers[name] = value;
}

/**
 * Set a header only when no spelling of it is present
 */
export function setHeaderIfMissing(headers: Record<string, string>, name: string, value: string): boolean {
  if (hasHeader(headers, name)) {
    return false;
  }
  headers[name] = value;
  return true;
}

export function deleteHeader(headers: Record<string, string>, name: string): void {
  const key = findKey(headers, name);
  if (key !== undefined) {
    delete headers[key];
  }
}

/**
 * Merge header records left to right; later records win, case-insensitively
 */
export function mergeHeaders(...records: Array<Readonly<Record<string, string>> | undefined>): Record<string, string> {
  const merged: Record<string, string> = {};
  for (const record of records) {
    if (!record) continue;
    for (const [name, value] of Object.entries(record)) {
      setHeader(merged, name, value);
    }
  }
  return merged;
}
