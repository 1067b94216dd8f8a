import type { PayloadRequest } from 'payload'

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/** Parsed JSON object body, or `{}` when the body is missing or not an object */
export async function readJsonBody(req: PayloadRequest): Promise<Record<string, unknown>> {
  if (typeof req.json !== 'function') return {}
  try {
    const body: unknown = await req.json()
    return isRecord(body) ? body : {}
  } catch {
    return {}
  }
}

export function unauthorized(): Response {
  return Response.json({ error: 'Unauthorized' }, { status: 401 })
}

export function internalError(area: string, error: unknown): Response {
  console.error(`[proofline/${area}] Error:`, error)
  return Response.json({ error: 'Internal server error' }, { status: 500 })
}
