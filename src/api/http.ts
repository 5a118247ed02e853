import { readFileSync } from "fs";
import https from "https";
import fetch from "cross-fetch";
import { ConfigError, getErrorMessage } from "../utils/error-handling";

/**
 * Trust an extra PEM bundle for every outgoing TLS connection, for networks
 * that re-sign traffic with a corporate root CA.
 */
export function trustCaBundle(path: string): void {
  let pem: string;
  try {
    pem = readFileSync(path, "utf8");
  } catch (e) {
    throw new ConfigError(`CA_BUNDLE could not be read (${path}): ${getErrorMessage(e)}`);
  }
  https.globalAgent.options.ca = pem;
}

/** Fetch that fails with `<api> API error: ...` on any non-2xx status. */
export async function fetchOrThrow(api: string, url: string, init: RequestInit, timeoutMs: number): Promise<Response> {
  const res = await fetch(url, { ...init, signal: AbortSignal.timeout(timeoutMs) });

  if (!res.ok) {
    const text = await res.text().catch(() => "");
    let message = `${api} API error: ${res.status} ${res.statusText}`;
    if (text) message += ` – ${text.slice(0, 300)}`;
    throw new Error(message);
  }

  return res;
}
