import crypto from "node:crypto";
import type { SignedHeaders } from "./tuyaTypes.js";

export const SIGN_METHOD = "HMAC-SHA256";

/** SHA-256 of the empty string; the content hash of every body-less request. */
export const EMPTY_BODY_HASH = "e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855";

export type Credentials = Readonly<{
  clientId: string;
  clientSecret: string;
}>;

export type SigningContext = {
  method: string;
  /** Path including the query string, exactly as sent. */
  pathAndQuery: string;
  body?: string | Uint8Array;
  accessToken?: string;
  /** Millisecond epoch as a decimal string. */
  timestamp: string;
  nonce: string;
};

export const contentHash = (body: string | Uint8Array = "") =>
  crypto.createHash("sha256").update(body).digest("hex");

// No custom signed headers are supported, hence the empty line.
export const stringToSign = (method: string, bodyHash: string, pathAndQuery: string) =>
  `${method}\n${bodyHash}\n\n${pathAndQuery}`;

export const signingMaterial = (context: SigningContext, clientId: string) =>
  clientId +
  (context.accessToken ?? "") +
  context.timestamp +
  context.nonce +
  stringToSign(context.method, contentHash(context.body), context.pathAndQuery);

/**
 * Produces the signed request headers for one call. Deterministic for fixed
 * inputs; time and nonce are supplied by the caller.
 */
export const sign = (context: SigningContext, credentials: Credentials): SignedHeaders => {
  const signature = crypto
    .createHmac("sha256", credentials.clientSecret)
    .update(signingMaterial(context, credentials.clientId))
    .digest("hex")
    .toUpperCase();

  return {
    client_id: credentials.clientId,
    t: context.timestamp,
    nonce: context.nonce,
    sign_method: SIGN_METHOD,
    sign: signature,
    ...(context.accessToken ? { access_token: context.accessToken } : {})
  };
};
