/**
 * Card export
 */

export type { CardExporter, ExportContext, ExportFailure, ExportReport } from './types.js';
export {
  AnkiConnectExporter,
  DEFAULT_ANKICONNECT_URL,
  CLOZE_MODEL_NAME,
  BASIC_MODEL_NAME,
  NOTE_TAG,
  titleTag,
} from './anki-connect.js';
export type { AnkiConnectOptions } from './anki-connect.js';
export { FileExporter, formatCardLine, hourStamp } from './file-exporter.js';
export type { FileExporterOptions } from './file-exporter.js';
