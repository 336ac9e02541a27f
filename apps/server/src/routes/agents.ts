import { Router } from "express";
import { z } from "zod";
import { handleServiceError, requireAuth } from "../middleware/auth.js";
import { accessControl, type AccessControlResolver } from "../services/accessControl.js";
import { authStore } from "../services/authStore.js";
import { toAuthUser } from "../services/authService.js";
import type { AuthRepository } from "../types/auth.js";

const listAgentsQuerySchema = z.object({
  q: z.string().trim().max(120).optional(),
  zone: z.string().trim().max(120).optional(),
  active: z.enum(["true", "false"]).optional()
});

const agentIdSchema = z.coerce.number().int().positive();

export function createAgentsRouter(resolver: AccessControlResolver, repository: AuthRepository): Router {
  const router = Router();

  router.get("/api/agents/visible-ids", requireAuth, async (req, res) => {
    if (!req.authContext) return res.status(401).json({ error: "unauthenticated" });
    try {
      const ids = await resolver.visibleIdentityIds(req.authContext.user);
      return res.json({ ids });
    } catch (error) {
      return handleServiceError(error, res, "visibility_lookup_failed");
    }
  });

  router.get("/api/agents", requireAuth, async (req, res) => {
    if (!req.authContext) return res.status(401).json({ error: "unauthenticated" });
    const parsed = listAgentsQuerySchema.safeParse(req.query);
    if (!parsed.success) return res.status(400).json({ error: parsed.error.flatten() });

    try {
      const ids = await resolver.visibleIdentityIds(req.authContext.user);
      const agents = await repository.listUsers({
        ids,
        q: parsed.data.q || undefined,
        zone: parsed.data.zone || undefined,
        active: parsed.data.active ? parsed.data.active === "true" : undefined
      });
      return res.json({ items: agents.map(toAuthUser) });
    } catch (error) {
      return handleServiceError(error, res, "agent_list_failed");
    }
  });

  router.get("/api/agents/:agentId", requireAuth, async (req, res) => {
    if (!req.authContext) return res.status(401).json({ error: "unauthenticated" });
    const parsed = agentIdSchema.safeParse(req.params.agentId);
    if (!parsed.success) return res.status(404).json({ error: "agent_not_found" });

    try {
      const visible = await resolver.canView(req.authContext.user, parsed.data);
      const agent = visible ? await repository.findUserById(parsed.data) : null;
      if (!agent) return res.status(404).json({ error: "agent_not_found" });
      return res.json({ agent: toAuthUser(agent) });
    } catch (error) {
      return handleServiceError(error, res, "agent_lookup_failed");
    }
  });

  return router;
}

export const agentsRouter = createAgentsRouter(accessControl, authStore);
