export { locateExportDocument, openArchive, withArchive } from './archiveAccessor';
export type { ArchiveHandle, ArchiveOptions } from './archiveAccessor';
