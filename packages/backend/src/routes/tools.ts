/**
 * Tool catalog routes
 */

import type { FastifyPluginAsync } from 'fastify';
import type { ToolCatalog } from '../tools/catalog.js';
import type { CatalogSnapshot } from '../tools/types.js';

export interface ToolRoutesOptions {
  catalog: ToolCatalog;
}

function formatCatalog(snapshot: CatalogSnapshot) {
  return {
    tools: snapshot.tools,
    resources: snapshot.resources,
    resourceTemplates: snapshot.resourceTemplates,
    fetchedAt: snapshot.fetchedAt.toISOString(),
  };
}

const toolRoutes: FastifyPluginAsync<ToolRoutesOptions> = async (fastify, { catalog }) => {
  /**
   * Current catalog, discovered on first use
   */
  fastify.get('/tools', async () => {
    const snapshot = catalog.isInitialized() ? catalog.get() : await catalog.refresh();
    return formatCatalog(snapshot);
  });

  /**
   * Force a new discovery pass
   */
  fastify.post('/tools/refresh', async () => {
    return formatCatalog(await catalog.refresh());
  });
};

export default toolRoutes;
