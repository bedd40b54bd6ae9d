import { Router } from 'express';
import { Services } from '../../services';
import { createAdminController } from '../../controllers/adminController';
import authAdmin from '../../middleware/authAdmin';
import serviceProviderRoutes from './serviceProviders';
import metadataStoreRoutes from './metadataStores';

export default function adminRoutes(services: Services, adminToken: string) {
  const controller = createAdminController(services);
  const router = Router();

  router.use(authAdmin(adminToken));
  router.use('/service-providers', serviceProviderRoutes(controller));
  router.use('/metadata-stores', metadataStoreRoutes(controller));
  router.get('/snapshots/service-providers', controller.serviceProviderSnapshot);
  router.get('/snapshots/metadata-sources', controller.metadataSourceSnapshot);
  router.delete('/users/:userId/federation', controller.forgetUser);

  return router;
}
