/**
 * Limit string length for storage/processing
 */
export function limitLength(input: string, maxLength: number, marker = '... [truncated]'): string {
  if (input.length <= maxLength) {
    return input;
  }
  return input.slice(0, maxLength) + marker;
}

/**
 * Remove credentials from a URL or any message that may embed one
 * (https://token@host/...). Used before logging or reporting clone errors.
 */
export function redactCredentials(text: string): string {
  return text.replace(/(https?:\/\/)[^@\s/]+@/gi, '$1***@');
}

/**
 * Strip control characters from text that is echoed back to a terminal.
 */
export function stripControlChars(input: string): string {
  return input.replace(/[\u0000-\u0008\u000B-\u001F\u007F-\u009F\u200B-\u200F\u2028-\u202F\uFEFF]/g, '');
}

// Max sizes for content sent to the judge
export const LIMITS = {
  TREE_MAX_LENGTH: 5000,
  CONTENT_MAX_LENGTH: 50000,
  OVERVIEW_MAX_LENGTH: 20000,
  README_MAX_LENGTH: 5000,
  TEST_FILE_MAX_LENGTH: 3000,
  CONFIG_FILE_MAX_LENGTH: 1000,
  MAX_TEST_FILES: 20,
  MAX_COMMITS: 30,
} as const;
