import { Router } from 'express';
import { AdminController } from '../../controllers/adminController';
import { validate } from '../../lib/validator';

export default function metadataStoreRoutes(controller: AdminController) {
  const router = Router();

  router.get('/', controller.listMetadataStores);
  router.post('/', validate.metadataStore, controller.createMetadataStore);
  router.get('/:id', validate.id, controller.getMetadataStore);
  router.put('/:id', validate.id, validate.metadataStoreUpdate, controller.updateMetadataStore);
  router.post('/:id/validate', validate.id, controller.validateMetadataStore);
  router.delete('/:id', validate.id, controller.deleteMetadataStore);

  return router;
}
