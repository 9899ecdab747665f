export { envelope, countLines, type Envelope } from './envelope.js';
export {
  ReportStore,
  type FullReportResult,
  type LineWindow,
  type LineWindowOptions,
  type ReportArtifact,
  type ReportRef,
  type ReportSection,
  type ReportStoreOptions,
} from './store.js';
