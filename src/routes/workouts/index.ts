import express from "express";
import workoutController from "../../controllers/workout.controller";
import { optionalAuth, requireAuth } from "../../middlewares/auth.middleware";
import { validateRequest } from "../../middlewares/schema-validation.middleware";
import {
  createWorkoutSchema,
  listWorkoutsSchema,
  updateWorkoutSchema,
  workoutIdSchema,
} from "../../validators/workout.validator";

const router = express.Router();

router.get("/", optionalAuth, validateRequest(listWorkoutsSchema), workoutController.list);
router.get("/:id", optionalAuth, validateRequest(workoutIdSchema), workoutController.get);

router.post("/", requireAuth, validateRequest(createWorkoutSchema), workoutController.create);
router.patch("/:id", requireAuth, validateRequest(updateWorkoutSchema), workoutController.update);
router.delete("/:id", requireAuth, validateRequest(workoutIdSchema), workoutController.delete);
router.post("/:id/clone", requireAuth, validateRequest(workoutIdSchema), workoutController.clone);

export default router;
