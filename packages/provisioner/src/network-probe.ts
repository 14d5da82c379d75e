export interface ProbeResult {
  reachable: boolean;
  /** HTTP status when a response arrived. */
  status?: number;
  error?: string;
}

/** Issues a reachability probe. Injected so tests never touch the network. */
export type NetworkProbe = (url: string, timeoutMs: number) => Promise<ProbeResult>;

/**
 * HEAD request with a hard timeout. Any HTTP response, whatever its status,
 * means the host is reachable; only transport failures count as unreachable.
 */
export const httpHeadProbe: NetworkProbe = async (url, timeoutMs) => {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(url, {
      method: 'HEAD',
      redirect: 'manual',
      signal: controller.signal,
    });
    return { reachable: true, status: response.status };
  } catch (err) {
    const error = controller.signal.aborted
      ? `timed out after ${timeoutMs}ms`
      : err instanceof Error
        ? err.message
        : String(err);
    return { reachable: false, error };
  } finally {
    clearTimeout(timeoutId);
  }
};
