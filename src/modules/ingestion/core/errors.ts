/**
 * Ingestion Module - Errors
 */

/**
 * Structural problem with an input file. Aborts that file only.
 */
export interface ParseError {
  readonly type: 'ParseError';
  readonly message: string;
  readonly file: string;
  readonly sheet?: string;
  readonly row?: number;
  readonly cause?: unknown;
}

export interface ParseErrorLocation {
  sheet?: string;
  row?: number;
}

export const createParseError = (
  file: string,
  message: string,
  location: ParseErrorLocation = {},
  cause?: unknown
): ParseError => ({
  type: 'ParseError',
  message,
  file,
  ...(location.sheet !== undefined && { sheet: location.sheet }),
  ...(location.row !== undefined && { row: location.row }),
  ...(cause !== undefined && { cause }),
});

export const describeParseError = (error: ParseError): string => {
  const where = [
    error.sheet !== undefined ? `sheet '${error.sheet}'` : undefined,
    error.row !== undefined ? `row ${String(error.row)}` : undefined,
  ].filter((part) => part !== undefined);
  return where.length > 0
    ? `${error.file} (${where.join(', ')}): ${error.message}`
    : `${error.file}: ${error.message}`;
};
