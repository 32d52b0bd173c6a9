// Security headers for every HTTP response
import type { ServerResponse } from "node:http";

export interface CSPOptions {
  frameAncestors?: string[];
  connectSources?: string[];
}

const DEFAULT_CSP_OPTIONS: CSPOptions = {
  frameAncestors: [],
  connectSources: [],
};

export function buildCSPHeader(options: CSPOptions = DEFAULT_CSP_OPTIONS): string {
  const directives: string[] = ["default-src 'none'"];

  const connectSrc = ["'self'", ...(options.connectSources ?? [])];
  directives.push(`connect-src ${connectSrc.join(" ")}`);
  directives.push("base-uri 'none'");
  directives.push("form-action 'none'");

  const ancestors = options.frameAncestors ?? [];
  directives.push(`frame-ancestors ${ancestors.length ? ancestors.join(" ") : "'none'"}`);

  return directives.join("; ");
}

/**
 * Apply security headers to response.
 * Headers must be set before writeHead() is called.
 */
export function applySecurityHeaders(res: ServerResponse, options?: CSPOptions): void {
  if (res.headersSent) return;
  res.setHeader("Content-Security-Policy", buildCSPHeader(options));
  res.setHeader("X-Content-Type-Options", "nosniff");
  res.setHeader("Referrer-Policy", "no-referrer");
  res.setHeader("Cache-Control", "no-store");
}
