/**
 * Alias Routes
 * Layer: Interfaces (HTTP)
 *
 *   GET /api/v1/aliases  →  every alias with the collection it points at
 *
 * Changing aliases goes through POST /api/v1/collections/aliases, since an
 * alias batch is a collection meta operation like create or delete.
 */
import { Router } from 'express';
import { CollectionsController } from '@interfaces/http/controllers/CollectionsController';

const router = Router();
const controller = new CollectionsController();

router.get('/aliases', controller.listAliases);

export { router as aliasRoutes };
