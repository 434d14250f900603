import { createHash, timingSafeEqual } from 'crypto';
import { UnauthorizedError } from '../errors/ServiceError';
import { IAuthGate } from '../interfaces/services';
import { Credentials } from '../types/domain';

export interface BasicCredentials {
  username: string;
  password: string;
}

// Splits `Basic <base64(username:password)>`; null for anything that isn't that shape
export function parseBasicAuthorization(header: string | undefined): BasicCredentials | null {
  if (!header) return null;

  const match = /^Basic\s+([A-Za-z0-9+/]+={0,2})\s*$/i.exec(header);
  if (!match) return null;

  const decoded = Buffer.from(match[1], 'base64').toString('utf8');
  const separator = decoded.indexOf(':');
  if (separator < 0) return null;

  return {
    username: decoded.slice(0, separator),
    password: decoded.slice(separator + 1)
  };
}

// Hashing first keeps the comparison length-independent
function constantTimeEquals(supplied: string, expected: string): boolean {
  const suppliedDigest = createHash('sha256').update(supplied).digest();
  const expectedDigest = createHash('sha256').update(expected).digest();
  return timingSafeEqual(suppliedDigest, expectedDigest);
}

export class BasicAuthGate implements IAuthGate {
  constructor(private readonly credentials: Pick<Credentials, 'localUsername' | 'localPassword'>) {}

  authorize(authorizationHeader: string | undefined): void {
    const supplied = parseBasicAuthorization(authorizationHeader);
    if (!supplied) {
      throw new UnauthorizedError();
    }

    // Both comparisons always run
    const usernameMatches = constantTimeEquals(supplied.username, this.credentials.localUsername);
    const passwordMatches = constantTimeEquals(supplied.password, this.credentials.localPassword);

    if (!(usernameMatches && passwordMatches)) {
      throw new UnauthorizedError();
    }
  }
}
