import { fail } from "@idcore/shared";

const GROUP_WIDTH = 3;
const MAX_CHAR_CODE = 10 ** GROUP_WIDTH - 1;
const MAX_TOPIC = (1n << 256n) - 1n;

// Character codes must stay within 1..999: an all-zero group would not
// survive the leading-zero strip or the bigint conversion.
export const formatTopic = (label: string) => {
  if (!label) {
    return fail("invalid_request", "topic_label_invalid", "label is empty");
  }
  let digits = "";
  for (const char of label) {
    const code = char.codePointAt(0) ?? 0;
    if (code < 1 || code > MAX_CHAR_CODE) {
      return fail("invalid_request", "topic_label_invalid", `unsupported character code ${code}`);
    }
    digits += String(code).padStart(GROUP_WIDTH, "0");
  }
  let stripped = 0;
  while (stripped < 2 && digits.startsWith("0")) {
    digits = digits.slice(1);
    stripped += 1;
  }
  return digits;
};

export const labelToTopic = (label: string) => {
  const topic = BigInt(formatTopic(label));
  if (topic > MAX_TOPIC) {
    return fail("invalid_request", "topic_out_of_range", `label "${label}" exceeds 256 bits`);
  }
  return topic;
};

export const topicToLabel = (topic: bigint) => {
  if (topic <= 0n || topic > MAX_TOPIC) {
    return fail("invalid_request", "topic_out_of_range", topic.toString());
  }
  const digits = topic.toString();
  const padded = digits.padStart(Math.ceil(digits.length / GROUP_WIDTH) * GROUP_WIDTH, "0");
  let label = "";
  for (let index = 0; index < padded.length; index += GROUP_WIDTH) {
    const code = Number(padded.slice(index, index + GROUP_WIDTH));
    if (code < 1) {
      return fail("invalid_request", "topic_label_invalid", `topic ${digits} has an empty group`);
    }
    label += String.fromCodePoint(code);
  }
  return label;
};
