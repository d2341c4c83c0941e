import type { AwxInstanceConfig } from '../config.js';
import { log } from '../config.js';

export interface AuthProvider {
  readonly scheme: 'bearer' | 'basic' | 'none';
  getAuthHeaders(): Record<string, string>;
}

export class TokenAuth implements AuthProvider {
  readonly scheme = 'bearer';
  private readonly header: string;

  constructor(token: string) {
    if (!token) {
      throw new Error('AWX token must be a non-empty string');
    }
    this.header = `Bearer ${token}`;
  }

  getAuthHeaders(): Record<string, string> {
    return { Authorization: this.header };
  }
}

export class BasicAuth implements AuthProvider {
  readonly scheme = 'basic';
  private readonly header: string;

  constructor(username: string, password: string) {
    if (!username) {
      throw new Error('AWX username must be a non-empty string');
    }
    this.header = `Basic ${Buffer.from(`${username}:${password}`, 'utf-8').toString('base64')}`;
  }

  getAuthHeaders(): Record<string, string> {
    return { Authorization: this.header };
  }
}

export class AnonymousAuth implements AuthProvider {
  readonly scheme = 'none';

  getAuthHeaders(): Record<string, string> {
    return {};
  }
}

/**
 * Token wins over username/password.
 */
export function createAuthProvider(
  instance: Pick<AwxInstanceConfig, 'name' | 'token' | 'username' | 'password'>
): AuthProvider {
  if (instance.token) {
    return new TokenAuth(instance.token);
  }
  if (instance.username) {
    return new BasicAuth(instance.username, instance.password ?? '');
  }
  log(`Auth: instance "${instance.name}" has no credentials, requests will be anonymous`);
  return new AnonymousAuth();
}
