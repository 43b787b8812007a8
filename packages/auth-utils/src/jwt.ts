import jwt from 'jsonwebtoken';
import type { SignOptions } from 'jsonwebtoken';
import { z } from 'zod';

const TOKEN_ISSUER = 'cleaning-queue';
const TOKEN_AUDIENCE = 'cleaning-queue-api';
const MIN_SECRET_LENGTH = 32;
const DEFAULT_EXPIRY_SECONDS = 15 * 60;

interface JwtRuntimeConfig {
  accessSecret: string;
  accessExpirySeconds: number;
}

function readOptionalEnv(name: string): string | undefined {
  const value = process.env[name];
  if (typeof value !== 'string' || value.length === 0) return undefined;
  return value;
}

function readRequiredSecret(name: 'JWT_SECRET'): string {
  const value = readOptionalEnv(name);
  if (!value || value.length < MIN_SECRET_LENGTH) {
    throw new Error(
      `${name} must be set to a string with at least ${MIN_SECRET_LENGTH} characters`,
    );
  }
  return value;
}

function getJwtRuntimeConfig(): JwtRuntimeConfig {
  const expiry = Number(readOptionalEnv('JWT_EXPIRY_SECONDS') ?? DEFAULT_EXPIRY_SECONDS);
  return {
    accessSecret: readRequiredSecret('JWT_SECRET'),
    accessExpirySeconds: Number.isFinite(expiry) && expiry > 0 ? expiry : DEFAULT_EXPIRY_SECONDS,
  };
}

// ─── JWT Payload Types ────────────────────────────────────────────────
const jwtPayloadSchema = z.object({
  sub: z.string().min(1), // user ID
  email: z.string(),
  role: z.string().min(1),
  iat: z.number().optional(),
  exp: z.number().optional(),
});

export type JwtPayload = z.infer<typeof jwtPayloadSchema>;

export class InvalidTokenPayloadError extends Error {
  constructor() {
    super('Token payload is missing required claims');
    this.name = 'InvalidTokenPayloadError';
  }
}

// ─── Access Tokens ────────────────────────────────────────────────────
export function generateAccessToken(payload: Omit<JwtPayload, 'iat' | 'exp'>): string {
  const runtime = getJwtRuntimeConfig();
  const options: SignOptions = {
    expiresIn: runtime.accessExpirySeconds,
    issuer: TOKEN_ISSUER,
    audience: TOKEN_AUDIENCE,
  };
  return jwt.sign(payload, runtime.accessSecret, options);
}

export function verifyAccessToken(token: string): JwtPayload {
  const runtime = getJwtRuntimeConfig();
  const decoded = jwt.verify(token, runtime.accessSecret, {
    issuer: TOKEN_ISSUER,
    audience: TOKEN_AUDIENCE,
  });
  const parsed = jwtPayloadSchema.safeParse(decoded);
  if (!parsed.success) throw new InvalidTokenPayloadError();
  return parsed.data;
}
