import jwt from 'jsonwebtoken';
import config from '@/config';

export type SessionRole = 'admin' | 'student';

export interface SessionUser {
  id: string;
  role: SessionRole;
  name: string;
}

export interface Payload {
  sub: string;
  role: SessionRole;
  name: string;
}

const isPayload = (value: unknown): value is Payload =>
  typeof value === 'object' &&
  value !== null &&
  'sub' in value &&
  typeof value.sub === 'string' &&
  'role' in value &&
  (value.role === 'admin' || value.role === 'student') &&
  'name' in value &&
  typeof value.name === 'string';

export const generateToken = (user: SessionUser, secret: string = config.JWT_SECRET) => {
  const payload: Payload = {
    sub: user.id,
    role: user.role,
    name: user.name,
  };
  return jwt.sign(payload, secret, { expiresIn: config.JWT_EXPIRES_IN });
};

export const PASSWORD_RESET_TTL = 60 * 60;

interface ResetPayload {
  sub: string;
  role: SessionRole;
  purpose: 'password-reset';
}

const isResetPayload = (value: unknown): value is ResetPayload =>
  typeof value === 'object' &&
  value !== null &&
  'sub' in value &&
  typeof value.sub === 'string' &&
  'role' in value &&
  (value.role === 'admin' || value.role === 'student') &&
  'purpose' in value &&
  value.purpose === 'password-reset';

/** Reset tokens carry no `name`, so `verifyToken` never accepts one as a session. */
export const generateResetToken = (account: { id: string; role: SessionRole }, secret: string = config.JWT_SECRET) => {
  const payload: ResetPayload = { sub: account.id, role: account.role, purpose: 'password-reset' };
  return jwt.sign(payload, secret, { expiresIn: PASSWORD_RESET_TTL });
};

/** The account id a reset token was issued for, or null when it is invalid, expired or for another role. */
export const verifyResetToken = (token: string, role: SessionRole, secret: string = config.JWT_SECRET): string | null => {
  try {
    const decoded = jwt.verify(token, secret);
    if (!isResetPayload(decoded) || decoded.role !== role) return null;
    return decoded.sub;
  } catch {
    return null;
  }
};

/**
 * Returns the session carried by a token, or null when the token is
 * malformed, expired or signed with another secret.
 */
export const verifyToken = (token: string, secret: string = config.JWT_SECRET): SessionUser | null => {
  try {
    const decoded = jwt.verify(token, secret);
    if (!isPayload(decoded)) return null;
    return { id: decoded.sub, role: decoded.role, name: decoded.name };
  } catch {
    return null;
  }
};
