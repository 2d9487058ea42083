import {
  getPublicKey,
  Point,
  Signature,
  signSync,
  utils,
  verify,
} from "@noble/secp256k1";
import { hmac } from "@noble/hashes/hmac";
import { sha256 } from "@noble/hashes/sha256";
import { Bytes } from "../bytes";
import { ECDSA_MESSAGE_HASH, SignData } from "../checksig/sign-data";

utils.hmacSha256Sync = (key, ...msgs) =>
  hmac(sha256, key, utils.concatBytes(...msgs));

utils.sha256Sync = (...msgs) => sha256(utils.concatBytes(...msgs));

export class PrivateKey {
  private _pk: Bytes;

  PublicKey: Bytes;
  UncompressedPublicKey: Bytes;

  constructor(pk: Bytes) {
    if (!utils.isValidPrivateKey(pk))
      throw new RangeError("Invalid private key");

    this._pk = pk;
    this.PublicKey = getPublicKey(this._pk, true);
    this.UncompressedPublicKey = getPublicKey(this._pk, false);
  }

  get point() {
    return Point.fromHex(this.PublicKey);
  }

  /** RFC 6979 signature over the ownership message hash. */
  sign = (messageHash: Bytes = ECDSA_MESSAGE_HASH) =>
    Signature.fromCompact(signSync(messageHash, this._pk, { der: false }));

  verify = (signature: Signature, messageHash: Bytes = ECDSA_MESSAGE_HASH) =>
    verify(signature, messageHash, this.PublicKey);

  signData = (): SignData => ({
    signature: this.sign(),
    publicKey: this.point,
  });
}
