import { RequestHandler } from "express";
import { ThrottleConfig } from "./config";
import { ThrottleController } from "./throttle";
import {
  createThrottleMiddlewareFromController,
  ThrottleMiddlewareOptions,
} from "../middleware/throttle-middleware-factory";

export function createThrottleMiddleware(
  config: ThrottleConfig = {},
  options?: ThrottleMiddlewareOptions
): RequestHandler {
  const throttle = new ThrottleController(config);
  return createThrottleMiddlewareFromController(throttle, options);
}
