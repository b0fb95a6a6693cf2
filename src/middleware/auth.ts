import { Request, Response, NextFunction } from 'express';

export function parseApiKeys(raw: string | undefined): Set<string> {
  return new Set(
    (raw || '')
      .split(',')
      .map((k) => k.trim())
      .filter((k) => k.length > 0)
  );
}

export function createApiKeyAuth(validKeys: Set<string>) {
  return function apiKeyAuth(req: Request, res: Response, next: NextFunction) {
    // Inbound lead webhooks are public
    if (req.path.startsWith('/webhook')) {
      return next();
    }

    if (req.path === '/health' || req.path === '/api/admin/health') {
      return next();
    }

    if (!req.path.startsWith('/api')) {
      return next();
    }

    const apiKey = req.header('x-api-key');

    if (!apiKey) {
      return res.status(401).json({ success: false, error: 'Missing API key' });
    }

    if (validKeys.size === 0 || !validKeys.has(apiKey)) {
      return res.status(403).json({ success: false, error: 'Invalid API key' });
    }

    next();
  };
}
