import express from "express";
import exerciseController from "../../controllers/exercise.controller";
import { optionalAuth, requireAuth } from "../../middlewares/auth.middleware";
import { validateRequest } from "../../middlewares/schema-validation.middleware";
import {
  createExerciseSchema,
  exerciseIdSchema,
  listExercisesSchema,
  updateExerciseSchema,
} from "../../validators/exercise.validator";

const router = express.Router();

// Shared exercises are readable without signing in
router.get("/", optionalAuth, validateRequest(listExercisesSchema), exerciseController.list);
router.get("/:id", optionalAuth, validateRequest(exerciseIdSchema), exerciseController.get);

router.post("/", requireAuth, validateRequest(createExerciseSchema), exerciseController.create);
router.patch("/:id", requireAuth, validateRequest(updateExerciseSchema), exerciseController.update);
router.delete("/:id", requireAuth, validateRequest(exerciseIdSchema), exerciseController.delete);

export default router;
