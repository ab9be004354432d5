import { Request, Response, NextFunction } from "express";

/**
 * Shared access-code guard. When ACCESS_CODE is unset the API is open, which
 * is the normal setup for a local single-user install.
 */
export const accessCodeMiddleware = (req: Request, res: Response, next: NextFunction) => {
  const expectedCode = process.env.ACCESS_CODE;
  if (!expectedCode) {
    next();
    return;
  }

  const accessCode = req.get("x-access-code");
  if (!accessCode) {
    res.status(401).json({ error: "Access code required" });
    return;
  }

  if (accessCode !== expectedCode) {
    res.status(403).json({ error: "Invalid access code" });
    return;
  }

  next();
};
