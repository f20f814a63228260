import type { Request } from 'express';

export function queryString(req: Request, name: string): string | undefined {
    const value = req.query[name];
    return typeof value === 'string' && value.trim().length > 0 ? value.trim() : undefined;
}

export function deviceIdFrom(req: Request, fallback: string): string {
    return queryString(req, 'device_id') ?? fallback;
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

// Form posts from the dashboard expect a redirect, API clients expect JSON
export function wantsRedirect(req: Request): boolean {
    return Boolean(req.is('urlencoded')) && req.accepts(['json', 'html']) === 'html';
}

export function parseId(value: string | undefined): number | null {
    if (!value || !/^\d+$/.test(value)) return null;
    return parseInt(value, 10);
}
