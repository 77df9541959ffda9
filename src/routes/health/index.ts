import express from "express";
import mongoose from "mongoose";
import { loadConfig } from "../../configs/environment";

const healthRouter = express.Router();

const CONNECTED = 1;

healthRouter.get("/", (_req, res) => {
  res.json({
    success: true,
    message: "Fitness tracking API is healthy",
    timestamp: new Date().toISOString(),
    uptime: process.uptime(),
    environment: loadConfig().nodeEnv,
  });
});

// The profile store may be down while the API keeps serving identity data
healthRouter.get("/status", (_req, res) => {
  const profileConnected = mongoose.connection.readyState === CONNECTED;
  res.json({
    success: true,
    timestamp: new Date().toISOString(),
    uptime: process.uptime(),
    stores: {
      identity: "configured",
      profile: profileConnected ? "connected" : "unavailable",
    },
    degraded: !profileConnected,
  });
});

export default healthRouter;
