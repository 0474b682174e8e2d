export {
  DOCUMENT_STORE,
  FIELD_DELETE,
  type DocumentStore,
  type DocumentData,
  type DocumentSnapshot,
  type QueryFilter,
  type BatchOperation,
} from './document-store.interface';
export { accountPaths, type AccountPaths } from './paths';
