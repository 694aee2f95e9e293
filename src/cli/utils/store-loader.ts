/**
 * Opens the configuration store for a CLI command
 */

import { resolveDbPath } from '../../lib/env';
import { getDbInstance, getDbInstancePath } from '../../lib/db-instance';
import {
  closeConfigurationStore,
  getConfigurationStore,
  type ConfigurationStore,
} from '../../lib/config-store';

/**
 * Open the shared database and return the store.
 *
 * @param dbPath - Database to use; when a different database is already open,
 *   the open store and connection are closed first. Omitted: keep the open
 *   connection, or open RC_DB_PATH.
 */
export function openStore(dbPath?: string): ConfigurationStore {
  const openPath = getDbInstancePath();
  if (dbPath !== undefined && openPath !== null && openPath !== resolveDbPath(dbPath)) {
    closeConfigurationStore();
  }

  getDbInstance(dbPath);
  return getConfigurationStore();
}
