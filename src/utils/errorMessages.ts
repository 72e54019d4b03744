/**
 * Error Message Utility
 * Turns yt-dlp diagnostic output into the message reported for a URL.
 */

/** Upper bound on tool output echoed back to callers. */
export const MAX_ERROR_LENGTH = 200;

export const AUTH_REQUIRED_MESSAGE =
  "YouTube asked to confirm this is not a bot. The authentication cookie is missing or expired.";

/**
 * Phrases yt-dlp prints when YouTube demands a signed-in session.
 * Matching on wording is brittle; update the list when yt-dlp changes its text.
 */
const AUTH_PHRASES = [
  "sign in to confirm",
  "not a bot",
  "use --cookies",
  "cookies-from-browser",
  "login required",
];

/**
 * True when the tool output reads like a bot-check / sign-in rejection.
 */
export function isAuthFailure(output: string): boolean {
  const text = output.toLowerCase();
  return AUTH_PHRASES.some((phrase) => text.includes(phrase));
}

/**
 * Trims tool output to a bounded, single-block message.
 */
export function truncateOutput(output: string, maxLength: number = MAX_ERROR_LENGTH): string {
  const text = output.trim();
  return text.length > maxLength ? text.slice(0, maxLength) : text;
}
