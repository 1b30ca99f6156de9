import { DnsError } from '../sync/errors.js';
import type { TransportError } from '../types.js';

export function describeTransportError(error: TransportError): string {
  if (error instanceof DnsError) {
    return `Connection error: could not reach ${error.hostname}. Check your internet connection.`;
  }
  if (error.status === 0) {
    return `Network error: ${error.message}`;
  }
  return `Server error (${error.status}): ${error.message}`;
}

export function formatProgress(percent: number, label: string, width: number = 30): string {
  const clamped = Math.max(0, Math.min(100, Math.floor(percent)));
  const filled = Math.round((clamped / 100) * width);
  return `[${'#'.repeat(filled)}${'-'.repeat(width - filled)}] ${String(clamped).padStart(3)}% ${label}`;
}
