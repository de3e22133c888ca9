/**
 * Export all handlers
 */
export {
  buildOrchestrator,
  createScanHandler,
  handler as scanSnapshotsHandler,
} from './scan-snapshots';
export {
  createRetrieveArchiveHandler,
  RetrieveArchiveEventSchema,
  handler as retrieveArchiveHandler,
  type RetrieveArchiveEvent,
} from './retrieve-archive';
export {
  createListExpiredSnapshotsHandler,
  ListExpiredEventSchema,
  handler as listExpiredSnapshotsHandler,
  type ListExpiredEvent,
} from './list-expired-snapshots';
export * from './runtime';
