import { Router } from 'express';
import { AdminController } from '../../controllers/adminController';
import { validate } from '../../lib/validator';

export default function serviceProviderRoutes(controller: AdminController) {
  const router = Router();

  router.get('/', controller.listServiceProviders);
  router.post('/', validate.serviceProvider, controller.createServiceProvider);
  router.get('/:id', validate.id, controller.getServiceProvider);
  router.put('/:id', validate.id, validate.serviceProviderUpdate, controller.updateServiceProvider);
  router.post('/:id/validate', validate.id, controller.validateServiceProvider);
  router.delete('/:id', validate.id, controller.deleteServiceProvider);

  return router;
}
