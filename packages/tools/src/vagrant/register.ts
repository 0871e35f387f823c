import { ToolRegistry } from '../registry.js';
import { VAGRANT_CATALOG } from './catalog.js';
import { VAGRANT_HANDLERS } from './handlers.js';

/**
 * Build the registry of all Vagrant tools. Throws CatalogError if the
 * catalog and the handler table have drifted apart.
 */
export function createVagrantRegistry(): ToolRegistry {
  return ToolRegistry.fromCatalog(VAGRANT_CATALOG, VAGRANT_HANDLERS);
}
