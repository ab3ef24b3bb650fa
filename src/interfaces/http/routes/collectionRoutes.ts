/**
 * Collection Routes
 * Layer: Interfaces (HTTP)
 *
 * Mounted under `/api/v1/collections` in app.ts:
 *
 *   GET    /                        →  controller.list
 *   POST   /aliases?timeout=N       →  controller.updateAliases
 *   GET    /:name                   →  controller.get
 *   PUT    /:name?timeout=N         →  controller.create
 *   PATCH  /:name?timeout=N         →  controller.update
 *   DELETE /:name?timeout=N         →  controller.delete
 *   GET    /:name/aliases           →  controller.listCollectionAliases
 */
import { Router } from 'express';
import { CollectionsController } from '@interfaces/http/controllers/CollectionsController';

const router = Router();
const controller = new CollectionsController();

router.get('/', controller.list);
router.post('/aliases', controller.updateAliases);
router.get('/:name', controller.get);
router.put('/:name', controller.create);
router.patch('/:name', controller.update);
router.delete('/:name', controller.delete);
router.get('/:name/aliases', controller.listCollectionAliases);

export { router as collectionRoutes };
