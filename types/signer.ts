export type Signature = {
  signature: string; //hex
  publicKey: string; //hex (DER spki for ed25519)
};

export interface Signer {
  readonly algorithm: string;
  readonly publicKey: string;
  sign(payload: Uint8Array): Signature;
}

export type Signed<T> = T & {
  signature: string;
  public_key: string;
};

//the bare payload when the service runs without a signer
export type SignedEnvelope<T> = T | Signed<T>;
