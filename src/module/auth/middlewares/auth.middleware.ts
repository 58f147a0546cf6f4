import { Request, Response, NextFunction, RequestHandler } from 'express';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import logger from '../../../utils/logger';
import { AppError } from '../../../utils/errors';

const jwtUserSchema = z.object({
  id: z.number(),
  username: z.string(),
  email: z.string().optional(),
  role: z.string(),
});

type JwtUser = z.infer<typeof jwtUserSchema>;

// adds `req.user` to every Express request
declare global {
  namespace Express {
    interface Request {
      user?: JwtUser;
    }
  }
}

// 🔐 Checks the bearer JWT
export const authenticateToken: RequestHandler = (req, res, next) => {
  const authHeader = req.headers.authorization;

  if (!authHeader || !authHeader.startsWith('Bearer ')) {
    res.status(401).json({ error: 'Missing or invalid token' });
    return;
  }

  const secret = process.env.JWT_SECRET;
  if (!secret) {
    next(new AppError('JWT_SECRET is not configured', 500, false));
    return;
  }

  const token = authHeader.slice('Bearer '.length);

  let decoded: unknown;
  try {
    decoded = jwt.verify(token, secret);
  } catch (err) {
    logger.warn('JWT rejected:', err instanceof Error ? err.message : String(err));
    res.status(403).json({ error: 'Invalid or expired token' });
    return;
  }

  const user = jwtUserSchema.safeParse(decoded);
  if (!user.success) {
    res.status(403).json({ error: 'Invalid or expired token' });
    return;
  }

  req.user = user.data;
  next();
};

// 🎯 Checks the user has one of the allowed roles
export const authorizeRole = (...roles: string[]) => {
    return (req: Request, res: Response, next: NextFunction): void => {
      if (!req.user) {
        res.status(401).json({ error: 'User not authenticated' });
        return;
      }
  
      if (!roles.includes(req.user.role)) {
        logger.log(`🎭 User role: ${req.user.role}, allowed roles: ${roles.join(', ')}`);

        res.status(403).json({ error: 'Forbidden' });

        return;
      }
  
      next();
    };
  };
