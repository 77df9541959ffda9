import mongoose from "mongoose";
import { logger } from "./utils/logger";
import { validateConfig } from "./configs/environment";
import {
  PROFILE_DB_OPTIONS,
  PROFILE_DB_RECONNECT,
  PROFILE_DB_URI,
} from "./configs/database";
import { StoreConnector } from "./repositories/storeConnector";
import { identityStore } from "./services";
import { STORE_NAMES } from "./utils/constants";

/**
 * Brings both stores up. The identity store is required; the document store
 * is not, and the API serves degraded responses until it becomes reachable.
 */
class FitnessApplication {
  private readonly profileStore = new StoreConnector(
    STORE_NAMES.PROFILE,
    () => mongoose.connect(PROFILE_DB_URI, PROFILE_DB_OPTIONS),
    PROFILE_DB_RECONNECT
  );

  async initialize() {
    logger.info("Starting fitness tracking API ...");
    validateConfig();

    await identityStore.initialize();

    if (!(await this.profileStore.start())) {
      logger.warn("Continuing in degraded mode until the profile store is reachable");
    }

    mongoose.connection.on("disconnected", () => logger.warn("Profile store disconnected"));
    mongoose.connection.on("reconnected", () => logger.info("Profile store reconnected"));

    logger.info("Fitness tracking API ready!");
  }

  async shutdown() {
    this.profileStore.stop();
    await mongoose.disconnect();
    await identityStore.close();
  }
}

export { FitnessApplication };
