export const readErrorMessage = async (res: Response): Promise<string> => {
  const fallback = `request failed with status ${res.status}`;
  if (!res.headers.get('content-type')?.includes('application/json')) return fallback;
  const body: unknown = await res.json();
  if (body && typeof body === 'object' && 'message' in body && typeof body.message === 'string') {
    return body.message;
  }
  return fallback;
};

export const fetchJson = async <T,>(url: string, init?: RequestInit): Promise<T> => {
  const res = await fetch(url, init);
  if (!res.ok) throw new Error(await readErrorMessage(res));
  return (await res.json()) as T;
};

export const postJson = <T,>(url: string, body: unknown): Promise<T> =>
  fetchJson<T>(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });
