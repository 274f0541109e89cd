import { createLogger } from "@idcore/shared";
import { createIdentity } from "../identity.js";
import type { CreateIdentityOptions } from "../identity.js";
import type { IdentityEvent, IdentityEventListener } from "../types.js";

export const IDENTITY_ADDRESS = "0x00000000000000000000000000000000000000aa";
export const OWNER = "0x1111111111111111111111111111111111111111";
export const CLAIM_SIGNER = "0x2222222222222222222222222222222222222222";
export const ACTION_ONE = "0x3333333333333333333333333333333333333333";
export const ACTION_TWO = "0x4444444444444444444444444444444444444444";
export const STRANGER = "0x5555555555555555555555555555555555555555";
export const EXTERNAL_TARGET = "0x6666666666666666666666666666666666666666";

export const silentLogger = createLogger({ service: "identity-test", level: "silent" });

export const newIdentity = (overrides: Partial<CreateIdentityOptions> = {}) =>
  createIdentity({
    address: IDENTITY_ADDRESS,
    owner: OWNER,
    logger: silentLogger,
    ...overrides
  });

export const recordEvents = (source: { subscribe: (listener: IdentityEventListener) => unknown }) => {
  const events: IdentityEvent[] = [];
  source.subscribe((event) => {
    events.push(event);
  });
  return events;
};

export const bytes = (...values: number[]) => new Uint8Array(values);
