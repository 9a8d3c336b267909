import { Router } from 'express';
import defaultInviteService, { type InviteService } from '../services/inviteService';
import { createInviteController } from '../controllers/inviteController';

export function createInvitesRouter(service: InviteService = defaultInviteService) {
  const router = Router();
  const { handlePreviewInvite, handleSendInvite } = createInviteController(service);

  // POST /api/invites/preview -> text/calendar
  router.post('/invites/preview', handlePreviewInvite);
  router.post('/invites', handleSendInvite);

  return router;
}

export default createInvitesRouter;
