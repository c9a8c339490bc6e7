import { stableStringify } from '../../modules/utils';
import { ILogger } from '../logger';
import { SignedEnvelope, Signer } from '../../types/signer';
import { Ed25519Signer, verifyEd25519 } from './ed25519';

/**
 * Wraps response payloads with a signature over their canonical
 * serialization. Without a signer the envelope is the payload itself.
 */
class SigningService {
  signer: Signer | null;
  logger: ILogger;

  constructor(signer: Signer | null, logger: ILogger) {
    this.signer = signer;
    this.logger = logger;
    if (signer) {
      this.logger.info(`signer-ready ${signer.algorithm} public key ${signer.publicKey}`);
    } else {
      this.logger.warn('signer-missing status responses will not be signed');
    }
  }

  get publicKey(): string | undefined {
    return this.signer?.publicKey;
  }

  sign<T extends object>(payload: T): SignedEnvelope<T> {
    if (!this.signer) {
      return payload;
    }
    const { signature, publicKey } = this.signer.sign(canonicalBytes(payload));
    return { ...payload, signature, public_key: publicKey };
  }
}

function canonicalBytes(payload: object): Uint8Array {
  return Buffer.from(stableStringify(payload), 'utf8');
}

/**
 * checks an ed25519 envelope offline: strips the signature fields,
 * re-serializes what remains and verifies against the embedded key
 */
function verifyEnvelope(envelope: Record<string, unknown>): boolean {
  const { signature, public_key, ...payload } = envelope;
  if (typeof signature !== 'string' || typeof public_key !== 'string') {
    return false;
  }
  try {
    return verifyEd25519(canonicalBytes(payload), signature, public_key);
  } catch {
    //malformed key or signature bytes
    return false;
  }
}

export { Ed25519Signer, SigningService, canonicalBytes, verifyEnvelope };
