/**
 * IdentityVerifier.test.ts
 *
 * Signature checks on identity payloads:
 * - a payload signed with the bot token verifies, in any field order
 * - any change to the hash or to a signed value is rejected
 * - malformed input is rejected without throwing
 */

import crypto from "crypto";
import { IdentityVerifier, parseIdentity } from "../IdentityVerifier";
import { TEST_BOT_TOKEN, signedPayload } from "../../__tests__/fixtures";

const verifier = new IdentityVerifier(TEST_BOT_TOKEN);

const hashOf = (payload: string) => {
  const segment = payload.split("&").find((s) => s.startsWith("hash="));
  return segment ? segment.slice("hash=".length) : "";
};

const replaceHash = (payload: string, hash: string) =>
  payload.replace(/hash=[0-9a-f]+/, `hash=${hash}`);

// Any hex digit other than the given one
const otherHex = (c: string) => (c === "0" ? "1" : "0");

describe("IdentityVerifier.verify", () => {
  const payload = signedPayload({ id: 42, first_name: "Test" });

  it("accepts a payload signed with the same bot token", () => {
    expect(verifier.verify(payload)).toBe(true);
  });

  it("matches a hash computed independently over the sorted check string", () => {
    const secret = crypto.createHash("sha256").update(TEST_BOT_TOKEN).digest();
    const hash = crypto
      .createHmac("sha256", secret)
      .update("auth_date=1700000000\nuser=%7B%22id%22%3A7%7D")
      .digest("hex");

    const manual = `user=%7B%22id%22%3A7%7D&hash=${hash}&auth_date=1700000000`;
    expect(verifier.verify(manual)).toBe(true);
  });

  it("does not depend on field order", () => {
    const reordered = payload.split("&").reverse().join("&");
    expect(verifier.verify(reordered)).toBe(true);
  });

  it("rejects a payload signed with another token", () => {
    expect(verifier.verify(signedPayload({ id: 42 }, "other-secret"))).toBe(false);
  });

  it("rejects every single-character change of the hash", () => {
    const hash = hashOf(payload);
    expect(hash).toHaveLength(64);

    for (let i = 0; i < hash.length; i++) {
      const tampered = hash.slice(0, i) + otherHex(hash[i]) + hash.slice(i + 1);
      expect(verifier.verify(replaceHash(payload, tampered))).toBe(false);
    }
  });

  it("rejects a changed field value", () => {
    const tampered = payload.replace("auth_date=1700000000", "auth_date=1700000001");
    expect(verifier.verify(tampered)).toBe(false);
  });

  it("rejects a swapped user field", () => {
    const other = encodeURIComponent(JSON.stringify({ id: 43, first_name: "Test" }));
    const original = encodeURIComponent(JSON.stringify({ id: 42, first_name: "Test" }));
    expect(verifier.verify(payload.replace(original, other))).toBe(false);
  });

  it("rejects an uppercase hash", () => {
    expect(verifier.verify(replaceHash(payload, hashOf(payload).toUpperCase()))).toBe(false);
  });

  it("rejects a payload without a hash", () => {
    const unsigned = payload
      .split("&")
      .filter((s) => !s.startsWith("hash="))
      .join("&");
    expect(verifier.verify(unsigned)).toBe(false);
  });

  it("rejects a payload with two hash fields", () => {
    expect(verifier.verify(`${payload}&hash=${hashOf(payload)}`)).toBe(false);
  });

  it("rejects an extra unsigned field", () => {
    expect(verifier.verify(`${payload}&chat_type=private`)).toBe(false);
  });

  it("rejects a segment without '='", () => {
    expect(verifier.verify(`${payload}&broken`)).toBe(false);
  });

  it("keeps '=' inside values", () => {
    const signed = verifier.sign({ start_param: "a=b", auth_date: "1" });
    expect(signed.startsWith("start_param=a=b&auth_date=1&hash=")).toBe(true);
    expect(verifier.verify(signed)).toBe(true);
  });

  it("returns false for garbage instead of throwing", () => {
    for (const input of ["", "&", "&&&", "hash", "=", "hash=", "%%%", "a=b", "user=%E0%A4%A"]) {
      expect(verifier.verify(input)).toBe(false);
    }
  });
});

describe("parseIdentity", () => {
  it("reads the platform user", () => {
    const payload = signedPayload({ id: 42, first_name: "Test", username: "tester" });
    expect(parseIdentity(payload)).toEqual({
      telegram_id: 42,
      username: "tester",
      first_name: "Test",
      last_name: null,
    });
  });

  it("returns null without a user field", () => {
    const payload = verifier.sign({ auth_date: "1700000000" });
    expect(parseIdentity(payload)).toBeNull();
  });

  it("returns null for a user field that is not JSON", () => {
    const warn = jest.spyOn(console, "warn").mockImplementation(() => undefined);
    const payload = verifier.sign({ user: "not-json" });
    expect(parseIdentity(payload)).toBeNull();
    expect(warn).toHaveBeenCalledTimes(1);
    warn.mockRestore();
  });

  it("returns null for a non-numeric or non-positive id", () => {
    for (const id of ['"42"', "0", "-5", "1.5"]) {
      const payload = verifier.sign({ user: encodeURIComponent(`{"id":${id}}`) });
      expect(parseIdentity(payload)).toBeNull();
    }
  });
});
