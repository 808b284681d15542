import { formatLocalTimestamp } from "../shared/time";

export const normalizeOcrText = (text: string, keepNewlines: boolean) => {
  const trimmed = text.trim();
  if (keepNewlines) {
    return trimmed.replace(/\n{3,}/g, "\n\n");
  }
  return trimmed.replace(/\s+/g, " ");
};

/** Empty (or whitespace-only) text never triggers a send. */
export const shouldSend = (text: string, lastText: string, onlyOnChange: boolean) => {
  if (!text.trim()) {
    return false;
  }
  return !onlyOnChange || text !== lastText;
};

export const formatMessage = (text: string, addTimestamp: boolean, now: Date = new Date()) => {
  if (!addTimestamp) {
    return text;
  }
  return `[${formatLocalTimestamp(now)}]\n${text}`;
};

export const buildPreview = (text: string, limit = 140) => {
  const flat = text.replace(/\s+/g, " ").trim();
  if (flat.length <= limit) {
    return flat;
  }
  return `${flat.slice(0, limit - 3)}...`;
};
