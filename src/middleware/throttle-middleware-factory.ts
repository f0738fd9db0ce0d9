import { Request, Response, NextFunction, RequestHandler } from "express";
import { ThrottleController } from "../throttle/throttle";

export interface ThrottleMiddlewareOptions {
  keyGenerator?: (req: Request) => string;
  skip?: (req: Request) => boolean;
  onLimitReached?: (req: Request, res: Response) => void;
}

const defaultKeyGenerator = (req: Request): string => {
  return req.ip || "unknown";
};

const defaultLimitHandler = (_req: Request, res: Response): void => {
  res.status(429).json({
    error: "Too Many Requests",
    message: "Request throttled. Please try again later.",
  });
};

export function createThrottleMiddlewareFromController(
  throttle: ThrottleController,
  options: ThrottleMiddlewareOptions = {}
): RequestHandler {
  const {
    keyGenerator = defaultKeyGenerator,
    skip,
    onLimitReached = defaultLimitHandler,
  } = options;

  return (req: Request, res: Response, next: NextFunction) => {
    if (skip && skip(req)) {
      return next();
    }

    const key = keyGenerator(req);

    throttle.run(key, () => true, {
      onThrottle: () => {
        // Retry-After는 초 단위 정수
        const retryAfter = Math.ceil(throttle.remainingMs(key) / 1000);
        res.set("Retry-After", String(retryAfter));
        onLimitReached(req, res);
      },
      onSuccess: () => next(),
    });
  };
}
