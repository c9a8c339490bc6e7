import {
  KeyObject,
  createPrivateKey,
  createPublicKey,
  generateKeyPairSync,
  sign,
  verify } from 'crypto';
import { Signature, Signer } from '../../types/signer';

class Ed25519Signer implements Signer {
  readonly algorithm = 'ED25519';
  readonly publicKey: string;
  private readonly privateKey: KeyObject;

  constructor(privateKey: KeyObject) {
    this.privateKey = privateKey;
    const publicDer = createPublicKey(privateKey).export({ format: 'der', type: 'spki' });
    this.publicKey = publicDer.toString('hex');
  }

  static fromBase64(privateKeyBase64: string): Ed25519Signer {
    const privateKey = createPrivateKey({
      key: Buffer.from(privateKeyBase64, 'base64'),
      format: 'der',
      type: 'pkcs8',
    });
    return new Ed25519Signer(privateKey);
  }

  static generate(): Ed25519Signer {
    const { privateKey } = generateKeyPairSync('ed25519');
    return new Ed25519Signer(privateKey);
  }

  sign(payload: Uint8Array): Signature {
    return {
      signature: sign(null, payload, this.privateKey).toString('hex'),
      publicKey: this.publicKey,
    };
  }
}

function verifyEd25519(payload: Uint8Array, signatureHex: string, publicKeyHex: string): boolean {
  const publicKey = createPublicKey({
    key: Buffer.from(publicKeyHex, 'hex'),
    format: 'der',
    type: 'spki',
  });
  return verify(null, payload, publicKey, Buffer.from(signatureHex, 'hex'));
}

export { Ed25519Signer, verifyEd25519 };
