/**
 * An API application allowed to call the HTTP surface.
 * The token itself is never stored, only its SHA-256 hex digest.
 */
export interface ApiApplicationRecord {
  appId: string;
  tokenHash: string;
  /** Whitespace-delimited scope tokens, e.g. "games:read games:new". */
  scopes: string;
  createdAt: Date;
}

export interface ApiApplicationCreateInput {
  appId: string;
  tokenHash: string;
  scopes: string;
}
