import * as XLSX from 'xlsx';
import { DispatchErrorCode, INGEST_COLUMNS, IngestCell, IngestColumn, IngestRow } from '@fletes/shared';
import { validationError } from '../common/dispatch-errors';

export const MAX_WORKBOOK_BYTES = 10 * 1024 * 1024;

const KNOWN_COLUMNS: ReadonlySet<string> = new Set(INGEST_COLUMNS);

function isIngestColumn(header: string): header is IngestColumn {
  return KNOWN_COLUMNS.has(header);
}

/** "Num kilos sicetac" and "NUM_KILOS_SICETAC" name the same column */
export function normalizeHeader(header: string): string {
  return header
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .trim()
    .toUpperCase()
    .replace(/[\s-]+/g, '_');
}

function toCell(value: unknown): IngestCell {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'string' || typeof value === 'number') {
    return value;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  return String(value);
}

/** Rows of the first sheet, keyed by ingest column; unknown columns are dropped */
export function parseIngestWorkbook(buffer: Buffer): IngestRow[] {
  if (buffer.length === 0) {
    throw validationError({ code: DispatchErrorCode.RequiredField, message: 'El archivo está vacío' });
  }
  if (buffer.length > MAX_WORKBOOK_BYTES) {
    throw validationError({
      code: DispatchErrorCode.BatchRejected,
      message: 'El archivo supera el tamaño máximo de 10 MB',
      context: { bytes: buffer.length },
    });
  }

  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.read(buffer, { type: 'buffer' });
  } catch (error: unknown) {
    throw validationError({
      code: DispatchErrorCode.BatchRejected,
      message: 'El archivo no es un libro de Excel válido',
      context: { reason: error instanceof Error ? error.message : String(error) },
    });
  }

  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName ? workbook.Sheets[sheetName] : undefined;
  if (!sheet) {
    throw validationError({ code: DispatchErrorCode.BatchRejected, message: 'El archivo no tiene hojas' });
  }

  const records = XLSX.utils.sheet_to_json<Record<string, unknown>>(sheet, { defval: null, raw: true });

  return records.map(record => {
    const row: IngestRow = {};
    for (const [header, value] of Object.entries(record)) {
      const column = normalizeHeader(header);
      if (isIngestColumn(column)) {
        row[column] = toCell(value);
      }
    }
    return row;
  });
}
