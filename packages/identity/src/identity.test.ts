import { test } from "node:test";
import assert from "node:assert/strict";
import { concatBytes, isIdentityError, keccak256, utf8ToBytes } from "@idcore/shared";
import { computeClaimId, emptyClaim } from "./claimRegistry.js";
import { keyIdForAddress } from "./keyRegistry.js";
import { encodeIdentityCall } from "./selfCall.js";
import {
  ACTION_ONE,
  ACTION_TWO,
  CLAIM_SIGNER,
  EXTERNAL_TARGET,
  IDENTITY_ADDRESS,
  OWNER,
  STRANGER,
  bytes,
  newIdentity,
  recordEvents
} from "./testUtils/fixtures.js";
import { KeyPurpose, KeyType } from "./types.js";
import type { ExternalCall } from "./types.js";

// "givenName" under the three-digit topic encoding.
const GIVEN_NAME = 103105118101110078097109101n;

test("the owner key holds management from creation", () => {
  const identity = newIdentity();
  const owner = keyIdForAddress(OWNER);
  assert.deepEqual(identity.getKey(owner), {
    key: owner,
    purposes: [KeyPurpose.MANAGEMENT],
    keyType: KeyType.ECDSA
  });
  assert.deepEqual(identity.getKeysByPurpose(KeyPurpose.MANAGEMENT), [owner]);
});

test("self claim round trip, removal, then a six claim batch from a claim key", () => {
  const identity = newIdentity();
  const claim = {
    topic: GIVEN_NAME,
    scheme: 1,
    issuer: OWNER,
    signature: bytes(0xaa, 0xbb),
    data: utf8ToBytes("Alice"),
    uri: "https://claims.example/alice"
  };
  const claimId = identity.addClaim(OWNER, claim);
  assert.equal(claimId, identity.computeClaimId(OWNER, GIVEN_NAME));
  assert.deepEqual(identity.getClaim(claimId), claim);

  assert.equal(identity.removeClaim(OWNER, claimId), true);
  assert.deepEqual(identity.getClaim(claimId), emptyClaim());

  identity.addKey(OWNER, { key: keyIdForAddress(CLAIM_SIGNER), purpose: KeyPurpose.CLAIM, keyType: KeyType.ECDSA });
  const values = ["Alice", "Smith", "alice@example.test", "Engineer", "1990", ""];
  const topics = values.map((_, index) => BigInt(index + 1));
  assert.equal(
    identity.addClaims(CLAIM_SIGNER, {
      topics,
      issuers: values.map(() => OWNER),
      signatures: bytes(),
      data: utf8ToBytes(values.join("")),
      dataLengths: values.map((value) => value.length)
    }),
    true
  );

  values.forEach((value, index) => {
    const stored = identity.getClaim(computeClaimId(OWNER, BigInt(index + 1)));
    assert.deepEqual(stored, {
      topic: BigInt(index + 1),
      scheme: 1,
      issuer: OWNER,
      signature: bytes(),
      data: utf8ToBytes(value),
      uri: ""
    });
  });
  assert.deepEqual(identity.getClaimIdsByTopic(3n), [computeClaimId(OWNER, 3n)]);
});

test("batched claims take one 32 byte signature each by default", () => {
  const identity = newIdentity();
  identity.addKey(OWNER, { key: keyIdForAddress(CLAIM_SIGNER), purpose: KeyPurpose.CLAIM, keyType: KeyType.ECDSA });
  const values = ["Alice", "Smith"];
  const signatures = values.map((value) => keccak256(utf8ToBytes(value)));
  identity.addClaims(CLAIM_SIGNER, {
    topics: [1n, 2n],
    issuers: [CLAIM_SIGNER, CLAIM_SIGNER],
    signatures: concatBytes(...signatures),
    data: utf8ToBytes(values.join("")),
    dataLengths: values.map((value) => value.length)
  });

  values.forEach((value, index) => {
    const stored = identity.getClaim(computeClaimId(CLAIM_SIGNER, BigInt(index + 1)));
    assert.deepEqual(stored.signature, signatures[index]);
    assert.equal(stored.signature.length, 32);
    assert.deepEqual(stored.data, utf8ToBytes(value));
  });
});

test("an unrecognised LOG_LEVEL in the environment does not block creation", () => {
  const previous = process.env.LOG_LEVEL;
  process.env.LOG_LEVEL = "debug";
  try {
    const identity = newIdentity({ config: { logLevel: "silent" } });
    assert.equal(identity.config.logLevel, "silent");
    assert.equal(newIdentity().config.logLevel, "info");
  } finally {
    if (previous === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = previous;
    }
  }
});

for (const [first, second] of [
  [ACTION_ONE, ACTION_TWO],
  [ACTION_TWO, ACTION_ONE]
]) {
  test(`action threshold of two runs on the second approval (${first.slice(0, 6)} first)`, () => {
    const calls: ExternalCall[] = [];
    const identity = newIdentity({
      config: { actionThreshold: 2 },
      dispatch: (call) => {
        calls.push(call);
        return true;
      }
    });
    for (const address of [ACTION_ONE, ACTION_TWO]) {
      identity.addKey(OWNER, { key: keyIdForAddress(address), purpose: KeyPurpose.ACTION, keyType: KeyType.ECDSA });
    }

    const id = identity.execute(first, { target: EXTERNAL_TARGET, value: 0n, payload: bytes(1) });
    assert.equal(identity.getExecution(id)?.status, "pending");
    assert.equal(identity.getExecution(id)?.approvals.length, 1);

    assert.equal(identity.approve(second, { executionId: id, approve: true }), true);
    assert.equal(identity.getExecution(id)?.status, "executed");
    assert.deepEqual(calls, [{ from: IDENTITY_ADDRESS, target: EXTERNAL_TARGET, value: 0n, payload: bytes(1) }]);

    assert.throws(
      () => identity.approve(first, { executionId: id, approve: true }),
      (error) => isIdentityError(error, "not_found")
    );
    assert.deepEqual(identity.getPendingExecutions(), []);
  });
}

test("approved requests aimed at the identity run the encoded operation", () => {
  const identity = newIdentity();
  const events = recordEvents(identity);
  const action = keyIdForAddress(ACTION_ONE);
  const id = identity.execute(OWNER, {
    target: IDENTITY_ADDRESS,
    value: 0n,
    payload: encodeIdentityCall({ method: "addKey", key: action, purpose: KeyPurpose.ACTION, keyType: KeyType.ECDSA })
  });

  assert.equal(identity.getExecution(id)?.succeeded, true);
  assert.equal(identity.keyHasPurpose(action, KeyPurpose.ACTION), true);
  assert.deepEqual(
    events.map((event) => event.type),
    ["execution_requested", "execution_approved", "key_added", "executed"]
  );
});

test("a self-call that fails leaves state untouched and reports failure", () => {
  const identity = newIdentity();
  const events = recordEvents(identity);
  const id = identity.execute(OWNER, {
    target: IDENTITY_ADDRESS,
    value: 0n,
    payload: encodeIdentityCall({ method: "removeClaim", claimId: computeClaimId(OWNER, 1n) })
  });
  assert.equal(identity.getExecution(id)?.succeeded, false);
  assert.deepEqual(
    events.map((event) => event.type),
    ["execution_requested", "execution_approved", "execution_failed"]
  );
});

test("external calls fail without a dispatcher", () => {
  const identity = newIdentity();
  const id = identity.execute(OWNER, { target: EXTERNAL_TARGET, value: 1n, payload: bytes() });
  assert.equal(identity.getExecution(id)?.status, "executed");
  assert.equal(identity.getExecution(id)?.succeeded, false);
  assert.ok(
    identity
      .renderMetrics()
      .split("\n")
      .includes('identity_executions_total{outcome="failed",service="identity"} 1')
  );
});

test("a batch with one unauthorized element writes nothing", () => {
  const identity = newIdentity();
  const events = recordEvents(identity);
  assert.throws(
    () =>
      identity.addClaims(STRANGER, {
        topics: [1n, 2n],
        issuers: [STRANGER, OWNER],
        signatures: bytes(),
        data: bytes(1, 2),
        dataLengths: [1, 1]
      }),
    (error) => isIdentityError(error, "unauthorized")
  );
  assert.deepEqual(identity.getClaimIdsByTopic(1n), []);
  assert.deepEqual(identity.getClaim(computeClaimId(STRANGER, 1n)), emptyClaim());
  assert.equal(events.length, 0);
});

test("a batch whose data runs short writes nothing", () => {
  const identity = newIdentity();
  assert.throws(
    () =>
      identity.addClaims(OWNER, {
        topics: [1n, 2n],
        issuers: [OWNER, OWNER],
        signatures: bytes(),
        data: bytes(1, 2),
        dataLengths: [1, 5]
      }),
    (error) => isIdentityError(error, "out_of_range")
  );
  assert.deepEqual(identity.getClaimIdsByTopic(1n), []);
});

test("subscribers see notifications after the operation has committed", () => {
  const identity = newIdentity();
  const signer = keyIdForAddress(CLAIM_SIGNER);
  const seen: number[][] = [];
  const unsubscribe = identity.subscribe((event) => {
    if (event.type === "key_added") {
      seen.push(identity.getKeyPurposes(event.key));
    }
  });
  identity.addKey(OWNER, { key: signer, purpose: KeyPurpose.CLAIM, keyType: KeyType.ECDSA });
  unsubscribe();
  identity.addKey(OWNER, { key: signer, purpose: KeyPurpose.ENCRYPT, keyType: KeyType.ECDSA });
  assert.deepEqual(seen, [[KeyPurpose.CLAIM]]);
});

test("malformed inputs are rejected before any change", () => {
  const identity = newIdentity();
  assert.throws(
    () => identity.addKey(OWNER, { key: "0x12", purpose: KeyPurpose.ACTION, keyType: KeyType.ECDSA }),
    (error) => isIdentityError(error, "invalid_request")
  );
  assert.throws(
    () => identity.addClaim("not-an-address", {
      topic: 1n,
      scheme: 1,
      issuer: OWNER,
      signature: bytes(),
      data: bytes()
    }),
    (error) => isIdentityError(error, "invalid_request")
  );
  assert.throws(
    () => identity.execute(OWNER, { target: EXTERNAL_TARGET, value: -1n, payload: bytes() }),
    (error) => isIdentityError(error, "invalid_request")
  );
  assert.throws(
    () => identity.addClaim(OWNER, { topic: 1n << 256n, scheme: 1, issuer: OWNER, signature: bytes(), data: bytes() }),
    (error) => isIdentityError(error, "invalid_request")
  );
});

test("extractRange copies the requested window", () => {
  const identity = newIdentity();
  assert.deepEqual(identity.extractRange(bytes(1, 2, 3, 4), 1, 2), bytes(2, 3));
  assert.deepEqual(identity.extractRange(bytes(1, 2), 2, 0), bytes());
  assert.throws(
    () => identity.extractRange(bytes(1, 2, 3, 4), 3, 2),
    (error) => isIdentityError(error, "out_of_range")
  );
});

test("operations are counted in the metrics output", () => {
  const identity = newIdentity();
  identity.addKey(OWNER, { key: keyIdForAddress(STRANGER), purpose: KeyPurpose.ENCRYPT, keyType: KeyType.RSA });
  assert.equal(
    identity.renderMetrics(),
    [
      "# TYPE identity_pending_executions gauge",
      'identity_pending_executions{service="identity"} 0',
      "# TYPE identity_operations_total counter",
      'identity_operations_total{op="add_key",service="identity"} 1',
      ""
    ].join("\n")
  );
});
