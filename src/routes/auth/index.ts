import express from "express";
import authController from "../../controllers/auth.controller";
import { requireAuth } from "../../middlewares/auth.middleware";
import { validateRequest } from "../../middlewares/schema-validation.middleware";
import {
  changePasswordSchema,
  loginSchema,
  registerSchema,
  updateAccountSchema,
} from "../../validators/auth.validator";

const router = express.Router();

router.post("/register", validateRequest(registerSchema), authController.register);
router.post("/login", validateRequest(loginSchema), authController.login);
router.post("/logout", requireAuth, authController.logout);
router.get("/me", requireAuth, authController.me);
router.patch(
  "/profile",
  requireAuth,
  validateRequest(updateAccountSchema),
  authController.updateAccount
);
router.post(
  "/change-password",
  requireAuth,
  validateRequest(changePasswordSchema),
  authController.changePassword
);

export default router;
