import express from "express";
const router = express.Router();

import healthRoute from "./health";
import authRoute from "./auth";
import exerciseRoute from "./exercises";
import workoutRoute from "./workouts";
import sessionRoute from "./sessions";
import logRoute from "./logs";

router.use("/health", healthRoute);
router.use("/api/health", healthRoute);

router.use("/api/auth", authRoute);
router.use("/api/exercises", exerciseRoute);
router.use("/api/workouts", workoutRoute);
router.use("/api/sessions", sessionRoute);
router.use("/api/logs", logRoute);

export default router;
