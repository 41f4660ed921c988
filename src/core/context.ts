import { randomBytes } from 'node:crypto';

import { TimerRegistry } from '../events/timer-registry.js';

/**
 * Process-wide state, built once at startup and handed to whoever needs it.
 */
export interface GatewayContext {
  /**
   * `user:pass`. Empty means nobody is authorized.
   */
  readonly credential: string;
  readonly timers: TimerRegistry;
}

export interface CredentialSettings {
  rpcUser: string;
  rpcPassword: string;
  requirePassword: boolean;
}

export type CredentialResult = { ok: true; credential: string } | { ok: false; suggestedPassword: string };

/**
 * Operator-facing channel, used only at startup.
 */
export type OperatorNotifier = (message: string) => void;

export function initRpcAuthentication(settings: CredentialSettings, notify: OperatorNotifier): CredentialResult {
  const { rpcUser, rpcPassword, requirePassword } = settings;

  if (requirePassword && (rpcPassword === '' || rpcUser === rpcPassword)) {
    const suggestedPassword = randomBytes(32).toString('base64url');
    notify(
      [
        'To use the RPC server you must set RPC_USER and RPC_PASSWORD.',
        'It is recommended you use the following random password:',
        'RPC_USER=rpcuser',
        `RPC_PASSWORD=${suggestedPassword}`,
        '(you do not need to remember this password)',
        'The username and password MUST NOT be the same.',
      ].join('\n'),
    );
    return { ok: false, suggestedPassword };
  }

  return { ok: true, credential: `${rpcUser}:${rpcPassword}` };
}

export function createGatewayContext(credential: string, timers = new TimerRegistry()): GatewayContext {
  return { credential, timers };
}
