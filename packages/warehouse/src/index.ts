/**
 * @cardledger/warehouse
 *
 * PostgreSQL access for the analytical store that receives downloaded records.
 */

export { createPool, getPoolConfig } from './client.js'
export { PgWarehouseLoader, assertTableName, DEFAULT_TABLE } from './loader.js'
export type { FlatRecord, FlatValue, PgWarehouseLoaderOptions, Queryable, WarehouseLoader } from './loader.js'
