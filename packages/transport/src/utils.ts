export const trimTrailingSlash = (value: string): string => value.replace(/\/+$/u, "");

export const ensureLeadingSlash = (value: string): string => (value.startsWith("/") ? value : `/${value}`);

export type QueryValue = string | number | boolean | undefined;

export const toUrl = (baseUrl: string, path: string, query?: Record<string, QueryValue>): string => {
  const url =
    path.startsWith("http://") || path.startsWith("https://")
      ? path
      : `${trimTrailingSlash(baseUrl)}${ensureLeadingSlash(path)}`;

  if (!query) {
    return url;
  }
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    if (value !== undefined) {
      params.append(key, String(value));
    }
  }
  const search = params.toString();
  if (!search) {
    return url;
  }
  return `${url}${url.includes("?") ? "&" : "?"}${search}`;
};

export const safeJsonParse = (payload: string): { readonly data?: unknown; readonly error?: Error } => {
  if (!payload) {
    return { data: undefined };
  }

  try {
    return { data: JSON.parse(payload) };
  } catch (error) {
    const parseError = error instanceof Error ? error : new Error(String(error));
    return { error: parseError };
  }
};

export const toHeadersRecord = (input: Iterable<[string, string]> | undefined): Record<string, string> => {
  if (!input) {
    return {};
  }

  const result: Record<string, string> = {};
  for (const [key, value] of input) {
    result[key.toLowerCase()] = value;
  }
  return result;
};

export const headerValue = (headers: Record<string, string>, name: string): string | undefined => {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted) {
      return value;
    }
  }
  return undefined;
};
