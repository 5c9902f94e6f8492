/**
 * RS256 signing key loading
 * Runs once while the JWT module initializes; any failure aborts startup.
 */

import { readFileSync } from 'fs';
import { createPrivateKey, createPublicKey, KeyObject } from 'crypto';
import { ERRORS, describeError } from '@tollgate/common/errors';

export interface SigningKeySource {
  privateKeyPath?: string;
  privateKey?: string;
  publicKeyPath?: string;
  publicKey?: string;
}

export interface SigningKeyPair {
  privateKey: KeyObject;
  publicKey: KeyObject;
  /** SPKI PEM of publicKey, the form @nestjs/jwt takes for verification */
  publicKeyPem: string;
}

export function loadSigningKeys(source: SigningKeySource): SigningKeyPair {
  const privatePem = readPem('private', source.privateKey, source.privateKeyPath);
  const publicPem = readPem('public', source.publicKey, source.publicKeyPath);

  let privateKey: KeyObject;
  let publicKey: KeyObject;
  try {
    privateKey = createPrivateKey(privatePem);
  } catch (error) {
    throw ERRORS.SigningKeyUnavailable(
      `private key is not valid PEM (${describeError(error)})`,
      error,
    );
  }
  try {
    publicKey = createPublicKey(publicPem);
  } catch (error) {
    throw ERRORS.SigningKeyUnavailable(
      `public key is not valid PEM (${describeError(error)})`,
      error,
    );
  }

  if (privateKey.asymmetricKeyType !== 'rsa' || publicKey.asymmetricKeyType !== 'rsa') {
    throw ERRORS.SigningKeyUnavailable('RS256 requires an RSA key pair');
  }

  // The public half must be derivable from the private key
  const derived = createPublicKey(privateKey).export({ type: 'spki', format: 'der' });
  const provided = publicKey.export({ type: 'spki', format: 'der' });
  if (!derived.equals(provided)) {
    throw ERRORS.SigningKeyUnavailable('public key does not match private key');
  }

  return {
    privateKey,
    publicKey,
    publicKeyPem: publicKey.export({ type: 'spki', format: 'pem' }).toString(),
  };
}

function readPem(
  kind: 'private' | 'public',
  inline: string | undefined,
  path: string | undefined,
): string {
  if (inline) {
    // Env files often carry PEM with escaped newlines
    return inline.replace(/\\n/g, '\n');
  }
  if (!path) {
    throw ERRORS.SigningKeyUnavailable(`no ${kind} key configured`);
  }
  try {
    return readFileSync(path, 'utf8');
  } catch (error) {
    throw ERRORS.SigningKeyUnavailable(
      `cannot read ${kind} key from ${path} (${describeError(error)})`,
      error,
    );
  }
}
