import express from "express";
import sessionController from "../../controllers/session.controller";
import { requireAuth } from "../../middlewares/auth.middleware";
import { validateRequest } from "../../middlewares/schema-validation.middleware";
import {
  completeSessionSchema,
  createSessionSchema,
  listSessionsSchema,
  sessionIdSchema,
  updateSessionSchema,
} from "../../validators/session.validator";

const router = express.Router();

router.use(requireAuth);

router.get("/", validateRequest(listSessionsSchema), sessionController.list);
router.post("/", validateRequest(createSessionSchema), sessionController.create);
router.get("/:id", validateRequest(sessionIdSchema), sessionController.get);
router.patch("/:id", validateRequest(updateSessionSchema), sessionController.update);
router.delete("/:id", validateRequest(sessionIdSchema), sessionController.delete);

router.post("/:id/start", validateRequest(sessionIdSchema), sessionController.start);
router.post("/:id/complete", validateRequest(completeSessionSchema), sessionController.complete);
router.post("/:id/cancel", validateRequest(sessionIdSchema), sessionController.cancel);

export default router;
