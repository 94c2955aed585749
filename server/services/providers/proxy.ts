import { ProxyAgent, setGlobalDispatcher } from 'undici';

/**
 * Route every outbound fetch through `proxyUrl` when one is configured.
 */
export function configureProxy(proxyUrl: string | undefined): boolean {
  if (!proxyUrl) {
    return false;
  }
  try {
    setGlobalDispatcher(new ProxyAgent(proxyUrl));
    console.warn(`[proxy] Using proxy for outbound requests: ${proxyUrl}`);
    return true;
  } catch (error) {
    console.warn('[proxy] Failed to initialise proxy agent:', error);
    return false;
  }
}
