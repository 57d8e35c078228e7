/**
 * KeelDB - Storage Module
 *
 * Exports all storage-related classes.
 */

export { Table, DESCRIBE_COLUMNS } from './Table';
export type { PendingUpdate } from './Table';
export { Database, DATABASE_VERSION } from './Database';
export type { ReferencingColumn } from './Database';
export { Catalog } from './Catalog';
export type { CatalogOptions } from './Catalog';
export { Persistence, CATALOG_FILE, DATABASES_DIR, databaseDocumentSchema, catalogDocumentSchema } from './Persistence';
