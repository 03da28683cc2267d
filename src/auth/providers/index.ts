export { ApiKeyAuthProvider, apiKeyPseudoEmail } from "./ApiKeyAuthProvider";
export type { ApiKeyAuthProviderOptions } from "./ApiKeyAuthProvider";
export { BearerTokenAuthProvider } from "./BearerTokenAuthProvider";
export { NorthHeadersAuthProvider } from "./NorthHeadersAuthProvider";
export type { NorthProviderOptions } from "./northIdentity";
export { OAuthAuthProvider } from "./OAuthAuthProvider";
export type { OAuthAuthProviderOptions, OAuthTokenValidator } from "./OAuthAuthProvider";
