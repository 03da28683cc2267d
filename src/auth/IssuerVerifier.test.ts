import { createServer, type Server } from "node:http";
import {
  createLocalJWKSet,
  exportJWK,
  generateKeyPair,
  type JWK,
  type KeyLike,
  SignJWT,
} from "jose";
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it, vi } from "vitest";
import { TokenVerificationError } from "./errors";
import { IssuerVerifier } from "./IssuerVerifier";

const ISSUER = "https://issuer.example";
const JWKS_URI = "https://issuer.example/keys";

describe("IssuerVerifier", () => {
  let privateKey: KeyLike;
  let otherPrivateKey: KeyLike;
  let publicJwk: JWK;
  const mockFetch = vi.fn();

  const signToken = (
    claims: Record<string, unknown>,
    options: { issuer?: string; kid?: string; key?: KeyLike; expiresAt?: number | string } = {},
  ) => {
    const jwt = new SignJWT(claims)
      .setProtectedHeader(
        options.kid === undefined ? { alg: "RS256" } : { alg: "RS256", kid: options.kid },
      )
      .setIssuedAt()
      .setExpirationTime(options.expiresAt ?? "1h");
    if (options.issuer) {
      jwt.setIssuer(options.issuer);
    }
    return jwt.sign(options.key ?? privateKey);
  };

  const createVerifier = (issuers: string[] = [ISSUER]) => {
    const createKeySet = vi.fn((_jwksUri: URL) => createLocalJWKSet({ keys: [publicJwk] }));
    const verifier = new IssuerVerifier(issuers, { createKeySet });
    return { verifier, createKeySet };
  };

  beforeAll(async () => {
    const pair = await generateKeyPair("RS256");
    privateKey = pair.privateKey;
    publicJwk = { ...(await exportJWK(pair.publicKey)), kid: "key-1", alg: "RS256" };
    otherPrivateKey = (await generateKeyPair("RS256")).privateKey;
  });

  beforeEach(() => {
    mockFetch.mockReset();
    mockFetch.mockResolvedValue({
      ok: true,
      status: 200,
      json: async () => ({ issuer: ISSUER, jwks_uri: JWKS_URI }),
    });
    vi.stubGlobal("fetch", mockFetch);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("should return the claims of a correctly signed token", async () => {
    const { verifier } = createVerifier();
    const token = await signToken({ email: "foo@bar.com" }, { issuer: ISSUER, kid: "key-1" });

    const claims = await verifier.verifyUserIdToken(token);

    expect(claims.email).toBe("foo@bar.com");
    expect(claims.iss).toBe(ISSUER);
    expect(mockFetch).toHaveBeenCalledTimes(1);
    expect(mockFetch.mock.calls[0][0]).toBe(
      "https://issuer.example/.well-known/openid-configuration",
    );
  });

  it("should strip a trailing slash from the issuer before discovery", async () => {
    const { verifier } = createVerifier([`${ISSUER}/`]);
    const token = await signToken({}, { issuer: `${ISSUER}/`, kid: "key-1" });

    await verifier.verifyUserIdToken(token);

    expect(mockFetch.mock.calls[0][0]).toBe(
      "https://issuer.example/.well-known/openid-configuration",
    );
  });

  it("should reject a token without an issuer", async () => {
    const { verifier } = createVerifier();
    const token = await signToken({ email: "foo@bar.com" }, { kid: "key-1" });

    await expect(verifier.verifyUserIdToken(token)).rejects.toThrow(
      new TokenVerificationError("missing issuer"),
    );
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it("should reject an untrusted issuer regardless of signature", async () => {
    const { verifier } = createVerifier();
    const token = await signToken(
      { email: "foo@bar.com" },
      { issuer: "https://other.example", kid: "key-1" },
    );

    await expect(verifier.verifyUserIdToken(token)).rejects.toThrow(
      "untrusted issuer: https://other.example",
    );
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it("should fail when discovery cannot be fetched", async () => {
    mockFetch.mockRejectedValueOnce(new Error("connect ECONNREFUSED"));
    const { verifier } = createVerifier();
    const token = await signToken({}, { issuer: ISSUER, kid: "key-1" });

    await expect(verifier.verifyUserIdToken(token)).rejects.toThrow(
      "unable to fetch issuer configuration",
    );
  });

  it("should fail when discovery returns an error status", async () => {
    mockFetch.mockResolvedValueOnce({ ok: false, status: 503, json: async () => ({}) });
    const { verifier } = createVerifier();
    const token = await signToken({}, { issuer: ISSUER, kid: "key-1" });

    await expect(verifier.verifyUserIdToken(token)).rejects.toThrow(
      "unable to fetch issuer configuration",
    );
  });

  it("should fail when the configuration has no jwks_uri", async () => {
    mockFetch.mockResolvedValueOnce({ ok: true, status: 200, json: async () => ({ issuer: ISSUER }) });
    const { verifier } = createVerifier();
    const token = await signToken({}, { issuer: ISSUER, kid: "key-1" });

    await expect(verifier.verifyUserIdToken(token)).rejects.toThrow(
      "issuer configuration missing jwks_uri",
    );
  });

  it("should fail when the token header has no key id", async () => {
    const { verifier } = createVerifier();
    const token = await signToken({}, { issuer: ISSUER });

    await expect(verifier.verifyUserIdToken(token)).rejects.toThrow("missing key identifier");
  });

  it("should fail when the signature does not match the published key", async () => {
    const { verifier } = createVerifier();
    const token = await signToken({}, { issuer: ISSUER, kid: "key-1", key: otherPrivateKey });

    await expect(verifier.verifyUserIdToken(token)).rejects.toThrow(
      "token signature verification failed",
    );
  });

  it("should fail for an expired token", async () => {
    const { verifier } = createVerifier();
    const token = await signToken(
      {},
      { issuer: ISSUER, kid: "key-1", expiresAt: Math.floor(Date.now() / 1000) - 60 },
    );

    await expect(verifier.verifyUserIdToken(token)).rejects.toThrow(
      "token signature verification failed",
    );
  });

  it("should reuse the key set for the same JWKS URI", async () => {
    const { verifier, createKeySet } = createVerifier();
    const token = await signToken({}, { issuer: ISSUER, kid: "key-1" });

    await verifier.verifyUserIdToken(token);
    await verifier.verifyUserIdToken(token);

    expect(createKeySet).toHaveBeenCalledTimes(1);
    expect(createKeySet.mock.calls[0][0].href).toBe(JWKS_URI);
  });

  it("should report trusted issuers", () => {
    const verifier = new IssuerVerifier([ISSUER]);
    expect(verifier.isTrusted(ISSUER)).toBe(true);
    expect(verifier.isTrusted(`${ISSUER}/`)).toBe(false);
  });
});

describe("IssuerVerifier with a remote key set", () => {
  let server: Server;
  let issuer: string;
  let jwks: { keys: JWK[] } = { keys: [] };
  let jwksRequests = 0;

  const createKey = async (kid: string) => {
    const pair = await generateKeyPair("RS256");
    const jwk: JWK = { ...(await exportJWK(pair.publicKey)), kid, alg: "RS256" };
    return { privateKey: pair.privateKey, jwk };
  };

  const sign = (key: KeyLike, kid: string, email: string) =>
    new SignJWT({ email })
      .setProtectedHeader({ alg: "RS256", kid })
      .setIssuer(issuer)
      .setExpirationTime("1h")
      .sign(key);

  beforeAll(async () => {
    server = createServer((request, response) => {
      response.setHeader("content-type", "application/json");
      if (request.url === "/.well-known/openid-configuration") {
        response.end(JSON.stringify({ issuer, jwks_uri: `${issuer}/jwks` }));
      } else if (request.url === "/jwks") {
        jwksRequests += 1;
        response.end(JSON.stringify(jwks));
      } else {
        response.statusCode = 404;
        response.end("{}");
      }
    });
    await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
    const address = server.address();
    if (address === null || typeof address === "string") {
      throw new Error("test server has no port");
    }
    issuer = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) =>
      server.close((error) => (error ? reject(error) : resolve())),
    );
  });

  it("should refetch the key set when a token names an unknown key", async () => {
    const first = await createKey("k1");
    const second = await createKey("k2");
    const verifier = new IssuerVerifier([issuer]);

    jwks = { keys: [first.jwk] };
    const firstClaims = await verifier.verifyUserIdToken(
      await sign(first.privateKey, "k1", "first@example.com"),
    );

    jwks = { keys: [second.jwk] };
    const secondClaims = await verifier.verifyUserIdToken(
      await sign(second.privateKey, "k2", "second@example.com"),
    );

    expect(firstClaims.email).toBe("first@example.com");
    expect(secondClaims.email).toBe("second@example.com");
    expect(jwksRequests).toBe(2);
  });
});
