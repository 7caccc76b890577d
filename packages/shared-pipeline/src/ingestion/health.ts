/**
 * FILE PURPOSE: Reachability probe for the external services the pipeline depends on
 * WHY: A dead validator or mapper silently turns every bundle into error annotations
 *      or every job into a retry. The API health route surfaces that.
 */

export type ServiceStatus = 'ok' | 'down';

export async function checkServiceHealth(url: string, timeoutMs = 2000): Promise<ServiceStatus> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(url, { method: 'HEAD', signal: controller.signal });
    return response.status === 200 ? 'ok' : 'down';
  } catch {
    return 'down';
  } finally {
    clearTimeout(timeout);
  }
}
