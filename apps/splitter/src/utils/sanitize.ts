const UNSAFE_FILE_CHARS = /[^A-Za-z0-9._-]/g;

export function sanitizeFileComponent(value: string): string {
  if (!value) {
    return value;
  }
  return value.trim().replace(UNSAFE_FILE_CHARS, '_');
}
