import test from "node:test";
import assert from "node:assert/strict";
import { buildTotpUri, normalizeAlgorithm } from "./provisioning.js";

const secret = Buffer.from("12345678901234567890", "ascii");

test("buildTotpUri emits the key uri with defaults", () => {
  const uri = buildTotpUri({ issuer: "example.org", label: "alice", secret });
  assert.equal(
    uri,
    "otpauth://totp/example.org:alice?secret=GEZDGNBVGY3TQOJQGEZDGNBVGY3TQOJQ&issuer=example.org&algorithm=SHA1&digit=6&period=30"
  );
});

test("buildTotpUri carries digits and period and escapes names", () => {
  const uri = buildTotpUri({ issuer: "Acme Corp", label: "bob@acme.test", secret, digits: 8, period: 60 });
  assert.equal(
    uri,
    "otpauth://totp/Acme%20Corp:bob%40acme.test?secret=GEZDGNBVGY3TQOJQGEZDGNBVGY3TQOJQ&issuer=Acme%20Corp&algorithm=SHA1&digit=8&period=60"
  );
});

test("non-SHA1 algorithms are written as SHA1", () => {
  assert.equal(normalizeAlgorithm("SHA256"), "SHA1");
  assert.equal(normalizeAlgorithm(), "SHA1");
  const uri = buildTotpUri({ issuer: "i", label: "l", secret, algorithm: "SHA512" });
  assert.equal(new URL(uri).searchParams.get("algorithm"), "SHA1");
});
