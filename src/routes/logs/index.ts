import express from "express";
import exerciseLogController from "../../controllers/exerciseLog.controller";
import { requireAuth } from "../../middlewares/auth.middleware";
import { validateRequest } from "../../middlewares/schema-validation.middleware";
import {
  bulkLogSchema,
  createLogSchema,
  listLogsSchema,
  logIdSchema,
  updateLogSchema,
} from "../../validators/exerciseLog.validator";

const router = express.Router();

router.use(requireAuth);

router.get("/", validateRequest(listLogsSchema), exerciseLogController.list);
router.post("/", validateRequest(createLogSchema), exerciseLogController.create);
router.post("/bulk", validateRequest(bulkLogSchema), exerciseLogController.createBulk);
router.get("/:id", validateRequest(logIdSchema), exerciseLogController.get);
router.patch("/:id", validateRequest(updateLogSchema), exerciseLogController.update);
router.delete("/:id", validateRequest(logIdSchema), exerciseLogController.delete);

export default router;
