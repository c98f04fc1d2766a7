import { AccountProxy } from '../interface/Account'
import { ConfigProxyCheck } from '../interface/Config'
import AxiosClient, { HttpRequester } from '../util/Axios'
import { shortErr } from '../util/Errors'
import { proxyLabel } from '../util/Load'
import { log } from '../util/Logger'
import Util from '../util/Utils'

export type ClientFactory = (proxy: AccountProxy) => HttpRequester

const defaultClientFactory: ClientFactory = (proxy) => new AxiosClient(proxy, { maxAttempts: 1 })

/**
 * Quick reachability probe: true when `url` answers 200 through the proxy.
 * It does not guarantee the proxy will get through a signup.
 */
export async function checkProxy(proxy: AccountProxy, url: string, timeoutMs: number, clientFactory: ClientFactory = defaultClientFactory): Promise<boolean> {
    try {
        const response = await clientFactory(proxy).request({
            url,
            method: 'GET',
            timeout: timeoutMs,
            maxRedirects: 5,
            validateStatus: () => true
        })
        return response.status === 200
    } catch (error) {
        log('main', 'PROXY-CHECK', `Proxy ${proxyLabel(proxy)} unreachable: ${shortErr(error)}`, 'warn')
        return false
    }
}

/** Drops proxies that fail the probe, `concurrency` probes at a time, preserving order */
export async function filterHealthyProxies(
    proxies: AccountProxy[],
    check: Pick<ConfigProxyCheck, 'url' | 'concurrency'>,
    timeoutMs: number,
    clientFactory: ClientFactory = defaultClientFactory
): Promise<AccountProxy[]> {
    const utils = new Util()
    const healthy: AccountProxy[] = []
    const batches = utils.chunkArray(proxies, Math.ceil(proxies.length / Math.max(1, check.concurrency)))

    for (const batch of batches) {
        const results = await Promise.all(batch.map(proxy => checkProxy(proxy, check.url, timeoutMs, clientFactory)))
        batch.forEach((proxy, i) => {
            if (results[i]) {
                healthy.push(proxy)
            } else {
                log('main', 'PROXY-CHECK', `Proxy skipped: ${proxyLabel(proxy)}`, 'warn')
            }
        })
    }

    log('main', 'PROXY-CHECK', `${healthy.length}/${proxies.length} proxies reachable`)
    return healthy
}
