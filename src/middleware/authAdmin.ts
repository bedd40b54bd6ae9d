import { Request, Response, NextFunction } from 'express';

export default function authAdmin(adminToken: string) {
  return (req: Request, res: Response, next: NextFunction) => {
    const token = req.headers['x-admin-token'] || req.headers.authorization?.replace('Bearer ', '');
    if (!adminToken || !token || token !== adminToken) {
      return res.status(401).json({ error: 'unauthorized' });
    }
    return next();
  };
}
