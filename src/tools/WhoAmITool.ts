import {
  getAuthenticatedUserOptional,
  getCurrentRequestContext,
  getNorthUser,
  type ProtocolRequestExtra,
} from "../auth";

export interface WhoAmIResult {
  authenticated: boolean;
  email: string | null;
  name: string | null;
  /** Connector names only; the tokens themselves never leave the server */
  connectors: string[];
  hasUserIdToken: boolean;
}

/**
 * Tool reporting who the current request runs as, read through the ambient request context.
 */
export class WhoAmITool {
  async execute(extra?: ProtocolRequestExtra): Promise<WhoAmIResult> {
    const identity = getAuthenticatedUserOptional();
    const context = getCurrentRequestContext(extra);
    const user = getNorthUser(extra);

    return {
      authenticated: identity !== null,
      email: identity?.email ?? user?.email ?? null,
      name: user?.name ?? null,
      connectors: Object.keys(context.connectorTokens).sort(),
      hasUserIdToken: Boolean(context.rawUserIdToken),
    };
  }
}
