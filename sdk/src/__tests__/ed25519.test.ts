import { describe, expect, it } from "vitest";
import {
  Ed25519Keypair,
  isValidPublicKey,
  parseEd25519KeyBytes,
  parseEd25519PublicKey,
  verifyStrict,
} from "../crypto/ed25519.js";
import { InvalidKeyError } from "../errors.js";
import { bytesToHex, toBase64, toBase64Url, utf8 } from "../utils/encoding.js";

const SECRET = new Uint8Array(32).fill(1);
const keypair = Ed25519Keypair.fromSecretKey(SECRET);
const message = utf8("hello nexus");

describe("Ed25519 signing", () => {
  it("verifies its own signatures", () => {
    const signature = keypair.sign(message);

    expect(signature).toHaveLength(64);
    expect(verifyStrict(keypair.publicKeyBytes(), message, signature)).toBe(true);
    expect(verifyStrict(keypair.publicKeyBytes(), utf8("hello nexus!"), signature)).toBe(false);
  });

  it("is deterministic", () => {
    expect(keypair.sign(message)).toEqual(Ed25519Keypair.fromSecretKey(SECRET).sign(message));
  });

  it("rejects small-order keys and non-canonical scalars", () => {
    const signature = keypair.sign(message);
    const highScalar = Uint8Array.from(signature);
    highScalar.fill(0xff, 32);

    expect(verifyStrict(new Uint8Array(32), message, signature)).toBe(false);
    expect(verifyStrict(keypair.publicKeyBytes(), message, highScalar)).toBe(false);
    expect(verifyStrict(keypair.publicKeyBytes(), message, signature.subarray(0, 63))).toBe(false);
  });

  it("checks public key encodings", () => {
    expect(isValidPublicKey(keypair.publicKeyBytes())).toBe(true);
    expect(isValidPublicKey(Uint8Array.of(1, ...new Uint8Array(31)))).toBe(false);
    expect(isValidPublicKey(new Uint8Array(32).fill(0xff))).toBe(false);
  });
});

describe("key parsing", () => {
  const publicHex = keypair.publicKeyHex();

  it("accepts hex, flagged hex and base64 forms", () => {
    const expected = keypair.publicKeyBytes();

    expect(parseEd25519PublicKey(publicHex)).toEqual(expected);
    expect(parseEd25519PublicKey(`0x00${publicHex}`)).toEqual(expected);
    expect(parseEd25519PublicKey(toBase64(expected))).toEqual(expected);
    expect(parseEd25519PublicKey(toBase64Url(expected))).toEqual(expected);
    expect(Ed25519Keypair.fromString(bytesToHex(SECRET)).publicKeyHex()).toBe(publicHex);
  });

  it("reports what is wrong with a key", () => {
    expect(() => parseEd25519KeyBytes(`01${publicHex}`)).toThrow("Unsupported key scheme flag 0x01");
    expect(() => parseEd25519KeyBytes("0x0102")).toThrow("Invalid key length 2");
    expect(() => parseEd25519KeyBytes("not+a_key")).toThrow(InvalidKeyError);
    expect(() => parseEd25519PublicKey("00".repeat(32))).toThrow(
      "Public key is not a canonical Ed25519 point of large order",
    );
  });
});
