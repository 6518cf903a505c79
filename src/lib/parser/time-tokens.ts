export const TIME_TOKEN_SOURCE = "\\d{1,2}:\\d{2}";

const TIME_TOKEN_REGEX = new RegExp(TIME_TOKEN_SOURCE);

export function hasTimeToken(text: string | undefined): boolean {
  return TIME_TOKEN_REGEX.test(text ?? "");
}

/** First `H:MM`/`HH:MM` token in the text, or an empty string. */
export function extractTime(text: string | undefined): string {
  const match = (text ?? "").match(TIME_TOKEN_REGEX);
  return match ? match[0] : "";
}

export function extractTimes(text: string | undefined): string[] {
  return Array.from((text ?? "").matchAll(new RegExp(TIME_TOKEN_SOURCE, "g")), (match) => match[0]);
}
