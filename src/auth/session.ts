/**
 * CareDesk - Session Tokens
 *
 * The session cookie carries a compact HMAC-SHA256 signed token:
 * `base64url(header).base64url(payload).signature`. Signing uses
 * node:crypto; the payload shape is checked with TypeBox on the way back in.
 */

import { createHmac, timingSafeEqual } from "node:crypto";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import type { Role } from "../db/schema/auth.ts";

const SessionPayloadSchema = Type.Object({
  sub: Type.Integer(), // principal id within its role table
  role: Type.Union([Type.Literal("admin"), Type.Literal("doctor"), Type.Literal("patient")]),
  username: Type.String(),
  iat: Type.Integer(),
  exp: Type.Integer(),
});

export type SessionPayload = Static<typeof SessionPayloadSchema>;

export type SessionSubject = {
  id: number;
  role: Role;
  username: string;
};

const HEADER = Buffer.from(JSON.stringify({ alg: "HS256", typ: "CDS" })).toString("base64url");

function hmacSign(data: string, secret: string): string {
  return createHmac("sha256", secret).update(data).digest("base64url");
}

export function issueSessionToken(
  subject: SessionSubject,
  secret: string,
  ttlSeconds: number,
  nowMs: number = Date.now(),
): string {
  const iat = Math.floor(nowMs / 1000);
  const payload: SessionPayload = {
    sub: subject.id,
    role: subject.role,
    username: subject.username,
    iat,
    exp: iat + ttlSeconds,
  };
  const body = Buffer.from(JSON.stringify(payload)).toString("base64url");
  return `${HEADER}.${body}.${hmacSign(`${HEADER}.${body}`, secret)}`;
}

/** Returns null for a token that is malformed, forged or expired. */
export function verifySessionToken(
  token: string,
  secret: string,
  nowMs: number = Date.now(),
): SessionPayload | null {
  const parts = token.split(".");
  if (parts.length !== 3) return null;
  const [header, body, signature] = parts;
  if (!header || !body || !signature) return null;

  const sigBuf = Buffer.from(signature, "base64url");
  const expectedBuf = Buffer.from(hmacSign(`${header}.${body}`, secret), "base64url");
  if (sigBuf.length !== expectedBuf.length || !timingSafeEqual(sigBuf, expectedBuf)) {
    return null;
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(Buffer.from(body, "base64url").toString());
  } catch {
    return null; // signed but not JSON: treat as no session
  }
  if (!Value.Check(SessionPayloadSchema, decoded)) return null;

  if (decoded.exp <= Math.floor(nowMs / 1000)) return null;
  return decoded;
}
