/**
 * Record encoders for the streaming writer.
 * An encoder turns one record into the text appended to the sink; the
 * writer calls `header` once, `encode` per record and `footer` once.
 */

export interface RecordEncoder<T> {
  header(): string;
  /** `index` is the position of the record among those written */
  encode(record: T, index: number): string;
  footer(count: number): string;
}

export type OutputFormat = 'csv' | 'json';

/**
 * Quote a CSV field when it holds the separator, a quote or a line break
 */
export function escapeCsvField(value: string, separator = ','): string {
  if (value.includes(separator) || /["\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function csvRow(fields: readonly string[], separator = ','): string {
  return fields.map((field) => escapeCsvField(field, separator)).join(separator);
}

export interface CsvColumn<T> {
  title: string;
  value: (record: T) => string;
}

export function csvEncoder<T>(columns: readonly CsvColumn<T>[], separator = ','): RecordEncoder<T> {
  return {
    header: () => `${csvRow(columns.map((c) => c.title), separator)}\n`,
    encode: (record) => `${csvRow(columns.map((c) => c.value(record)), separator)}\n`,
    footer: () => '',
  };
}

/**
 * JSON array, one record per line
 */
export function jsonArrayEncoder<T>(toJson: (record: T) => unknown = (record) => record): RecordEncoder<T> {
  return {
    header: () => '[\n',
    encode: (record, index) => `${index > 0 ? ',\n' : ''}  ${JSON.stringify(toJson(record))}`,
    footer: (count) => (count > 0 ? '\n]\n' : ']\n'),
  };
}

export interface KeyedEntry {
  key: string;
  value: unknown;
}

/**
 * Prefix every line but the first of a multi-line text
 */
export function indentContinuation(text: string, indent: string): string {
  return text.split('\n').join(`\n${indent}`);
}

/**
 * Members of one JSON object, pretty printed at the given depth
 */
export function jsonObjectEncoder(depth = 1): RecordEncoder<KeyedEntry> {
  const inner = '  '.repeat(depth + 1);
  const outer = '  '.repeat(depth);
  return {
    header: () => '{\n',
    encode: (entry, index) =>
      `${index > 0 ? ',\n' : ''}${inner}${JSON.stringify(entry.key)}: ${indentContinuation(
        JSON.stringify(entry.value, null, 2),
        inner
      )}`,
    footer: (count) => (count > 0 ? `\n${outer}}` : `${outer}}`),
  };
}
