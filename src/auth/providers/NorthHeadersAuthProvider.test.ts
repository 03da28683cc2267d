import { describe, expect, it, vi } from "vitest";
import { IssuerVerifier } from "../IssuerVerifier";
import { encodeConnectorTokens } from "../tokenCodec";
import { NorthHeadersAuthProvider } from "./NorthHeadersAuthProvider";

const base64Url = (value: unknown) =>
  Buffer.from(JSON.stringify(value), "utf8").toString("base64url");

const unsignedJwt = (claims: Record<string, unknown>) =>
  `${base64Url({ alg: "RS256", kid: "key-1" })}.${base64Url(claims)}.signature`;

describe("NorthHeadersAuthProvider", () => {
  it("should not apply when no X-North header is present", async () => {
    const provider = new NorthHeadersAuthProvider({ serverSecret: "s" });

    await expect(
      provider.authenticate({ headers: { authorization: "Bearer abc" } }),
    ).resolves.toBeNull();
  });

  it("should authenticate from the three headers", async () => {
    const provider = new NorthHeadersAuthProvider({ serverSecret: "s" });
    const idToken = unsignedJwt({ email: "foo@bar.com" });

    const identity = await provider.authenticate({
      headers: {
        "x-north-id-token": idToken,
        "x-north-connector-tokens": encodeConnectorTokens({ google: "g-token" }),
        "x-north-server-secret": "s",
      },
    });

    expect(identity).toEqual({
      email: "foo@bar.com",
      connectorAccessTokens: { google: "g-token" },
      rawUserIdToken: idToken,
      claims: { email: "foo@bar.com" },
    });
  });

  it("should match header names case-insensitively", async () => {
    const provider = new NorthHeadersAuthProvider();

    const identity = await provider.authenticate({
      headers: { "X-North-Connector-Tokens": encodeConnectorTokens({ a: "1" }) },
    });

    expect(identity?.connectorAccessTokens).toEqual({ a: "1" });
    expect(identity?.email).toBeUndefined();
  });

  it("should reject malformed connector tokens", async () => {
    const provider = new NorthHeadersAuthProvider();

    await expect(
      provider.authenticate({ headers: { "x-north-connector-tokens": "%%%not-base64%%%" } }),
    ).rejects.toThrow("invalid connector tokens format");
  });

  it("should reject a non-object connector payload", async () => {
    const provider = new NorthHeadersAuthProvider();

    await expect(
      provider.authenticate({ headers: { "x-north-connector-tokens": base64Url(["a"]) } }),
    ).rejects.toThrow("invalid connector tokens format");
  });

  it("should deny a mismatched server secret", async () => {
    const provider = new NorthHeadersAuthProvider({ serverSecret: "s" });

    await expect(
      provider.authenticate({ headers: { "x-north-server-secret": "other" } }),
    ).rejects.toThrow("access denied");
  });

  it("should use verified claims when issuers are trusted", async () => {
    const verifier = new IssuerVerifier(["https://issuer.example"]);
    const verify = vi
      .spyOn(verifier, "verifyUserIdToken")
      .mockResolvedValue({ email: "verified@example.com", iss: "https://issuer.example" });
    const provider = new NorthHeadersAuthProvider({ verifier });
    const idToken = unsignedJwt({ email: "unverified@example.com", iss: "https://issuer.example" });

    const identity = await provider.authenticate({ headers: { "x-north-id-token": idToken } });

    expect(verify).toHaveBeenCalledWith(idToken);
    expect(identity?.email).toBe("verified@example.com");
  });

  it("should not fall back to unverified claims when verification fails", async () => {
    const provider = new NorthHeadersAuthProvider({
      trustedIssuers: ["https://issuer.example"],
    });

    await expect(
      provider.authenticate({
        headers: { "x-north-id-token": unsignedJwt({ email: "foo@bar.com" }) },
      }),
    ).rejects.toThrow("invalid user id token: missing issuer");
  });
});
