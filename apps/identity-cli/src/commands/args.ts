import { AddressSchema, fail } from "@idcore/shared";
import { labelToTopic } from "@idcore/topic-codec";

export const requireArg = (value: string | undefined, name: string) => {
  if (!value) {
    return fail("invalid_request", `${name}_required`);
  }
  return value;
};

export const requireAddress = (value: string | undefined) => {
  const parsed = AddressSchema.safeParse(requireArg(value, "address"));
  if (!parsed.success) {
    return fail("invalid_request", "address_invalid", value);
  }
  return parsed.data;
};

// Decimal digits are taken as a topic number, anything else as a label.
export const parseTopicArg = (value: string | undefined) => {
  const raw = requireArg(value, "topic");
  return /^\d+$/.test(raw) ? BigInt(raw) : labelToTopic(raw);
};
