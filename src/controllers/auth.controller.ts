import { NextFunction, Request, Response } from "express";
import { currentIdentity } from "../middlewares/auth.middleware";
import { authService } from "../services";
import {
  AccountUpdateInput,
  ChangePasswordInput,
  LoginInput,
  RegisterInput,
} from "../types/request/authRequest";
import { sendSuccess } from "../utils/response";

class AuthController {
  register = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const input: RegisterInput = req.body;
      const session = await authService.register(input);
      sendSuccess(res, "Registration successful", session, 201);
    } catch (error) {
      next(error);
    }
  };

  login = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const input: LoginInput = req.body;
      const session = await authService.login(input);
      sendSuccess(res, "Login successful", session);
    } catch (error) {
      next(error);
    }
  };

  logout = async (_req: Request, res: Response, next: NextFunction) => {
    try {
      await authService.logout(currentIdentity(res).id);
      sendSuccess(res, "Logged out");
    } catch (error) {
      next(error);
    }
  };

  me = async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const account = await authService.me(currentIdentity(res));
      sendSuccess(res, "Account retrieved", account);
    } catch (error) {
      next(error);
    }
  };

  updateAccount = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const input: AccountUpdateInput = req.body;
      const account = await authService.updateAccount(currentIdentity(res), input);
      sendSuccess(res, "Account updated", account);
    } catch (error) {
      next(error);
    }
  };

  changePassword = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const input: ChangePasswordInput = req.body;
      const token = await authService.changePassword(currentIdentity(res).id, input);
      sendSuccess(res, "Password changed", { token });
    } catch (error) {
      next(error);
    }
  };
}

export default new AuthController();
