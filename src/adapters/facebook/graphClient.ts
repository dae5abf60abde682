import { SocialError } from '../../utils/errors.js';

export const GRAPH_BASE_URL = 'https://graph.facebook.com/v17.0';

interface GraphErrorBody {
  error?: { message?: string };
}

export interface FacebookCredentials {
  pageId: string;
  accessToken: string;
}

export interface GraphList<T> {
  data?: T[];
  paging?: { next?: string };
}

/** Call the Graph API and surface its error message with the HTTP status. Absolute URLs are used as given. */
export async function graphRequest<T>(pathname: string, init: RequestInit = {}): Promise<T> {
  const url = pathname.startsWith('https://') ? pathname : `${GRAPH_BASE_URL}/${pathname}`;
  const response = await fetch(url, init);
  if (!response.ok) {
    let detail = 'Unknown error';
    try {
      const body = (await response.json()) as GraphErrorBody;
      detail = body.error?.message ?? detail;
    } catch (parseError) {
      detail = parseError instanceof Error ? `unreadable error body: ${parseError.message}` : detail;
    }
    throw new SocialError(`Graph API error: ${response.status} ${detail}`, { status: response.status });
  }
  return (await response.json()) as T;
}

/** Read a list edge to its end by following `paging.next`. */
export async function graphRequestAll<T>(pathname: string): Promise<T[]> {
  const items: T[] = [];
  let next: string | undefined = pathname;
  while (next) {
    const page: GraphList<T> = await graphRequest<GraphList<T>>(next);
    items.push(...(page.data ?? []));
    next = page.paging?.next;
  }
  return items;
}
