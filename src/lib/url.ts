export type QueryValue = string | number | boolean | undefined | null;

export const appendQuery = (url: string, input: Record<string, QueryValue>, base = 'http://127.0.0.1:3101'): string => {
  const isAbs = /^https?:\/\//i.test(url);
  const U = new URL(url, isAbs ? undefined : base);
  for (const [k, v] of Object.entries(input)) {
    if (v === undefined || v === null) continue;
    U.searchParams.set(k, String(v));
  }
  return U.toString();
};
