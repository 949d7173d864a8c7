// Values shipped in .env templates that must be replaced before use.
const PLACEHOLDER_PATTERNS: ReadonlyArray<RegExp> = [
  /^your[_-]/iu,
  /^<[^>]*>$/u,
  /^(changeme|change_me|replace_me|placeholder|xxx+)$/iu,
  /@example\.com$/iu,
];

export const isPlaceholder = (value: string): boolean => {
  const trimmed = value.trim();
  return PLACEHOLDER_PATTERNS.some((pattern) => pattern.test(trimmed));
};
