import { NextResponse } from 'next/server';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

const API_VERSION = '1.0.0';

// GET /api/health
export async function GET() {
  return NextResponse.json({ status: 'healthy', version: API_VERSION });
}
