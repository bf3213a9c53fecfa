import { Router } from 'express';
import { AdminAuthOptions, createAdminAuth } from '../../middleware/adminAuth.middleware';
import { ProviderRegistry } from '../../providers/registry';
import { ProcessingSelectionService } from '../shared/processingSelection.service';
import { RuntimeConfigService } from '../shared/runtimeConfig.service';
import { AdminController } from './admin.controller';

export interface AdminRoutesDeps {
  runtimeConfig: RuntimeConfigService;
  selection: ProcessingSelectionService;
  providers: ProviderRegistry;
  auth: AdminAuthOptions;
}

export function createAdminRoutes(deps: AdminRoutesDeps): Router {
  const router = Router();
  const controller = new AdminController(deps.runtimeConfig, deps.selection, deps.providers);

  router.use(createAdminAuth(deps.auth));

  // GET /api/v1/admin/current_config - Runtime settings and provider availability
  router.get('/current_config', controller.getCurrentConfig.bind(controller));

  // POST /api/v1/admin/update_config - Change individual settings
  router.post('/update_config', controller.updateConfig.bind(controller));

  // POST /api/v1/admin/apply_preset - Switch to a named preset
  router.post('/apply_preset', controller.applyPreset.bind(controller));

  // POST /api/v1/admin/test_config - Run selection over sample files
  router.post('/test_config', controller.testConfig.bind(controller));

  // POST /api/v1/admin/force_provider/:provider - Session provider override
  router.post('/force_provider/:provider', controller.forceProvider.bind(controller));

  // DELETE /api/v1/admin/clear_session_overrides
  router.delete('/clear_session_overrides', controller.clearSessionOverrides.bind(controller));

  return router;
}
