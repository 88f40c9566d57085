// backend/auth/jwt.ts
import jwt, { type JwtPayload } from "jsonwebtoken";

export type AuthJwtPayload = JwtPayload & {
  sub: string; // user id
  email?: string;
};

export type JwtOptions = {
  secret: string;
  audience?: string;
};

export type JwtVerifier = (token: string) => AuthJwtPayload;

export const DEFAULT_AUDIENCE = "authenticated";
const JWT_EXPIRES_IN = "1h";
const JWT_ALGORITHM: jwt.Algorithm = "HS256";

// Issuing tokens belongs to the identity provider; this is for tests and local tooling.
export function signJwt(sub: string, options: JwtOptions, extra: { email?: string } = {}): string {
  return jwt.sign({ sub, ...extra }, options.secret, {
    expiresIn: JWT_EXPIRES_IN,
    algorithm: JWT_ALGORITHM,
    audience: options.audience ?? DEFAULT_AUDIENCE,
  });
}

export function verifyJwt(token: string, options: JwtOptions): AuthJwtPayload {
  const decoded = jwt.verify(token, options.secret, {
    algorithms: [JWT_ALGORITHM],
    audience: options.audience ?? DEFAULT_AUDIENCE,
  });

  if (typeof decoded !== "object" || !decoded) {
    throw new Error("Invalid JWT payload");
  }

  const { sub } = decoded;
  if (typeof sub !== "string" || !sub) {
    throw new Error("Invalid JWT payload: missing sub");
  }

  return { ...decoded, sub };
}

export function createJwtVerifier(options: JwtOptions): JwtVerifier {
  return (token) => verifyJwt(token, options);
}
