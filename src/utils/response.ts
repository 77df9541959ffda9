import { Response } from "express";
import { ErrorDetail } from "../common/errors";

type SuccessPayload<T> = {
  success: true;
  message: string;
  data?: T;
};

type ErrorPayload = {
  success: false;
  message: string;
  error?: string;
  details?: ErrorDetail[];
};

export const sendSuccess = <T>(
  res: Response,
  message: string,
  data?: T,
  status = 200
) => {
  const payload: SuccessPayload<T> = { success: true, message, data };
  return res.status(status).json(payload);
};

export const sendError = (
  res: Response,
  message: string,
  status = 400,
  error?: string,
  details?: ErrorDetail[]
) => {
  const payload: ErrorPayload = { success: false, message, error };
  if (details) payload.details = details;
  return res.status(status).json(payload);
};
