export type TransportResponse = {
  ok: boolean;
  status: number;
  statusText: string;
  body: Uint8Array;
};

/** Downloads one URL. Must honour `signal`. */
export type Transport = (url: string, init: { signal: AbortSignal }) => Promise<TransportResponse>;

/** Transport over Node's built-in fetch. */
export const httpTransport: Transport = async (url, { signal }) => {
  const res = await fetch(url, { signal, redirect: "follow" });
  const body = new Uint8Array(await res.arrayBuffer());
  return { ok: res.ok, status: res.status, statusText: res.statusText, body };
};
