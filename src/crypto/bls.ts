import { bls12_381 as bls } from '@noble/curves/bls12-381'
import { fromHex, toHex, type Hex } from '../core/hash'
import type { PublicKey } from '../core/types'

export type PrivKey = Uint8Array

export interface KeyPair {
  readonly privateKey: PrivKey
  readonly publicKey: PublicKey
}

export const randomPriv = (): PrivKey => bls.utils.randomPrivateKey()

export const pub = (priv: PrivKey): PublicKey => toHex(bls.getPublicKey(priv))

export const keyPair = (priv: PrivKey = randomPriv()): KeyPair => ({
  privateKey: priv,
  publicKey: pub(priv),
})

export const sign = async (msg: Uint8Array, priv: PrivKey): Promise<Hex> =>
  toHex(bls.sign(msg, priv))

export const verifySig = async (
  msg: Uint8Array,
  sigHex: Hex,
  pubHex: PublicKey
): Promise<boolean> => {
  try {
    return bls.verify(fromHex(sigHex), msg, fromHex(pubHex))
  } catch {
    // not a curve point
    return false
  }
}
