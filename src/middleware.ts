import { NextResponse, type NextRequest } from 'next/server';

import { getConfig } from '@/lib/env';
import {
  getCorsHeaders,
  getPreflightHeaders,
  isOriginAllowed,
} from '@/lib/http/cors';

export const config = {
  matcher: ['/upload'],
};

export function middleware(request: NextRequest) {
  const origin = request.headers.get('origin');
  if (!origin) return NextResponse.next();

  let allowedOrigins: string[];
  try {
    ({ allowedOrigins } = getConfig());
  } catch (err) {
    console.error('[cors] could not load configuration', err);
    return NextResponse.json(
      { error: 'Unexpected error processing the request.' },
      { status: 500 },
    );
  }
  const allowed = isOriginAllowed(origin, allowedOrigins);

  const isPreflight =
    request.method === 'OPTIONS' &&
    request.headers.has('access-control-request-method');
  if (isPreflight) {
    if (!allowed) {
      return new NextResponse('Disallowed CORS origin', { status: 400 });
    }
    return new NextResponse('OK', {
      status: 200,
      headers: getPreflightHeaders(
        origin,
        request.headers.get('access-control-request-headers'),
      ),
    });
  }

  const response = NextResponse.next();
  if (allowed) {
    for (const [name, value] of Object.entries(getCorsHeaders(origin))) {
      response.headers.set(name, value);
    }
  }
  return response;
}
