import { appConfig } from '../config';

export class ApiError extends Error {
  readonly status: number;
  readonly path: string;

  constructor(status: number, path: string) {
    super(`API ${status} for ${path}`);
    this.name = 'ApiError';
    this.status = status;
    this.path = path;
  }
}

export class DecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DecodeError';
  }
}

type QueryParams = Record<string, string | number | boolean | undefined>;

function buildUrl(path: string, params: QueryParams = {}): string {
  const qs = Object.entries(params)
    .filter((entry): entry is [string, string | number | boolean] => entry[1] !== undefined)
    .map(([k, v]) => `${encodeURIComponent(k)}=${encodeURIComponent(String(v))}`)
    .join('&');
  return `${appConfig.apiBasePath}${path}${qs ? `?${qs}` : ''}`;
}

/** Fetches JSON; callers decode the untyped body themselves. */
async function get(path: string, params?: QueryParams): Promise<unknown> {
  const res = await fetch(buildUrl(path, params), {
    headers: { Accept: 'application/json' },
  });
  if (!res.ok) throw new ApiError(res.status, path);
  try {
    const body: unknown = await res.json();
    return body;
  } catch {
    throw new DecodeError(`Invalid JSON from ${path}`);
  }
}

export const api = { get };
