const ISSUE_KEY_PATTERN = /^[A-Z][A-Z0-9_]+-\d+$/i;
const PROJECT_KEY_PATTERN = /^[A-Z][A-Z0-9_]+$/i;

export function validateIssueKey(key: string): boolean {
  return ISSUE_KEY_PATTERN.test(key.trim());
}

export function getProjectKeyError(key: string): string | null {
  if (!key.trim()) {
    return "Project key is required";
  }
  if (!PROJECT_KEY_PATTERN.test(key.trim())) {
    return `Invalid project key "${key}" (expected: ABC)`;
  }
  return null;
}

export function getDaysBackError(value: string): string | null {
  if (!/^\d+$/.test(value.trim())) {
    return `days_back must be a whole number of days, got "${value}"`;
  }
  if (Number(value) <= 0) {
    return "days_back must be greater than 0";
  }
  return null;
}
