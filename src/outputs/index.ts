export { CSV_HEADER, escapeCsvField, formatCsvRow, formatPlaylistTable, savePlaylistCsv } from './csv';
export { appendJsonl } from './jsonl';
