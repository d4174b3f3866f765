import { SetMetadata } from '@nestjs/common';

export const IS_PUBLIC_KEY = 'isPublic';

/**
 * Marks a route as reachable without a token. A bearer token, when sent,
 * is still resolved so handlers can tell anonymous callers apart.
 */
export const Public = () => SetMetadata(IS_PUBLIC_KEY, true);
