import type { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';

export const requestIdMiddleware = (req: Request, res: Response, next: NextFunction) => {
  // Keep the caller's id when it sends one
  const incoming = req.get('x-request-id');
  req.id = incoming !== undefined && incoming.length > 0 ? incoming : uuidv4();
  res.setHeader('x-request-id', req.id);
  next();
};
