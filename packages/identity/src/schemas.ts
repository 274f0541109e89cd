import { z } from "zod";
import { AddressSchema, Bytes32HexSchema, fail } from "@idcore/shared";

const MAX_UINT256 = (1n << 256n) - 1n;

export { AddressSchema };

export const KeyIdSchema = Bytes32HexSchema;

export const ClaimIdSchema = Bytes32HexSchema;

export const PurposeSchema = z.number().int().min(1);

export const KeyTypeSchema = z.number().int().min(1);

export const SchemeSchema = z.number().int().min(0);

export const TopicSchema = z
  .bigint()
  .refine((value) => value >= 0n && value <= MAX_UINT256, "topic_out_of_range");

export const ValueSchema = z
  .bigint()
  .refine((value) => value >= 0n && value <= MAX_UINT256, "value_out_of_range");

export const BytesSchema = z.instanceof(Uint8Array);

export const ExecutionIdSchema = z.number().int().min(0);

export const parseInput = <T extends z.ZodTypeAny>(schema: T, value: unknown): z.output<T> => {
  const result = schema.safeParse(value);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "input"}: ${issue.message}`)
      .join("; ");
    return fail("invalid_request", "invalid_request", details);
  }
  return result.data;
};
