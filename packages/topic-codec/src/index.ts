export { formatTopic, labelToTopic, topicToLabel } from "./codec.js";
