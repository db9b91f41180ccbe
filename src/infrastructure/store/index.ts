export { RecordStore, openRecordStore } from './record-store.js';
export type { RecordStoreOptions } from './record-store.js';
export { MemoryDocumentDriver } from './memory-driver.js';
export { PostgresDocumentDriver } from './postgres-driver.js';
export type {
  Document,
  StoredDocument,
  SortSpec,
  FindOptions,
  UpdateSpec,
  DocumentDriver,
} from './document-driver.js';
export { default as auditPlugin } from './audit-plugin.js';
