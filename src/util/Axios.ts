import axios, { AxiosInstance, AxiosRequestConfig, AxiosResponse } from 'axios'
import { Agent } from 'http'
import { HttpProxyAgent } from 'http-proxy-agent'
import { HttpsProxyAgent } from 'https-proxy-agent'
import { SocksProxyAgent } from 'socks-proxy-agent'

import { AccountProxy } from '../interface/Account'
import { errorCode, ProxyError } from './Errors'

export interface AxiosClientOptions {
    /** On repeated proxy/network failure, retry once without the proxy (off by default) */
    allowDirectFallback?: boolean;
    /** Attempts for network-level errors before giving up */
    maxAttempts?: number;
}

/** The part of AxiosClient the API helpers need; lets callers pass a stand-in */
export interface HttpRequester {
    request(config: AxiosRequestConfig, bypassProxy?: boolean): Promise<{ status: number; data: unknown }>
}

const RETRYABLE_CODES = new Set(['ECONNREFUSED', 'ETIMEDOUT', 'ECONNRESET', 'ENOTFOUND', 'ECONNABORTED'])

class AxiosClient implements HttpRequester {
    private instance: AxiosInstance
    private proxy?: AccountProxy
    private options: Required<AxiosClientOptions>

    constructor(proxy?: AccountProxy, options: AxiosClientOptions = {}) {
        this.proxy = proxy
        this.options = {
            allowDirectFallback: options.allowDirectFallback ?? false,
            maxAttempts: Math.max(1, options.maxAttempts ?? 2)
        }
        this.instance = axios.create()

        // when using custom agents, disable axios built-in proxy handling
        // otherwise axios's proxy config may conflict with the agent
        this.instance.defaults.proxy = false

        if (this.proxy && this.proxy.url && this.proxy.proxyAxios) {
            const agents = AxiosClient.getAgentsForProxy(this.proxy)
            this.instance.defaults.httpAgent = agents.http
            this.instance.defaults.httpsAgent = agents.https
        }
    }

    get proxied(): boolean {
        return this.instance.defaults.httpsAgent !== undefined
    }

    /**
     * Build agents for the provided proxy configuration:
     *  - accepts scheme-less host (assumes http)
     *  - normalizes socks5h:// -> socks5://
     *  - encodes username/password into the proxy URL
     */
    static getAgentsForProxy(proxyConfig: AccountProxy): { http: Agent; https: Agent } {
        const { url, port, username, password } = proxyConfig
        let urlStr = String(url || '')

        // If user provided only host/IP without scheme, assume http
        if (!/^[a-zA-Z][a-zA-Z0-9+.-]*:\/\//.test(urlStr)) {
            urlStr = `http://${urlStr}`
        }

        // Normalize: many tools/libraries (and Chromium) understand `socks5://` but not `socks5h://`
        urlStr = urlStr.replace(/^socks5h:\/\//i, 'socks5://')

        const parsed = new URL(urlStr)
        if (port) parsed.port = String(port)

        const cred = username
            ? `${encodeURIComponent(username)}:${encodeURIComponent(password || '')}@`
            : ''
        const hostPort = `${parsed.hostname}${parsed.port ? `:${parsed.port}` : ''}`
        // parsed.protocol includes trailing ":" (e.g. "http:")
        const proxyUrl = `${parsed.protocol}//${cred}${hostPort}`

        if (parsed.protocol === 'http:' || parsed.protocol === 'https:') {
            return { http: new HttpProxyAgent(proxyUrl), https: new HttpsProxyAgent(proxyUrl) }
        } else if (parsed.protocol.startsWith('socks')) {
            const agent = new SocksProxyAgent(proxyUrl)
            return { http: agent, https: agent }
        } else {
            throw new ProxyError(`Unsupported proxy protocol: ${parsed.protocol}`)
        }
    }

    // Generic method to make any Axios request
    public async request<T = unknown>(config: AxiosRequestConfig, bypassProxy = false): Promise<AxiosResponse<T>> {
        if (bypassProxy) {
            return this.direct<T>(config)
        }

        let lastError: unknown

        for (let attempt = 1; attempt <= this.options.maxAttempts; attempt++) {
            try {
                return await this.instance.request<T>(config)
            } catch (err: unknown) {
                lastError = err

                if (axios.isAxiosError(err) && err.response) {
                    if (err.response.status === 407) {
                        throw new ProxyError('407 Proxy Authentication Required', { cause: err })
                    }
                    // Server answered: not a transport problem, let the caller decide
                    throw err
                }

                const code = errorCode(err)
                const looksLikeProxyIssue = err instanceof Error && /proxy|tunnel|socks|agent/i.test(err.message)

                if (!RETRYABLE_CODES.has(code) && !looksLikeProxyIssue) {
                    throw err
                }

                if (attempt < this.options.maxAttempts) {
                    // Exponential backoff: 1s, 2s, 4s, ...
                    await this.sleep(1000 * Math.pow(2, attempt - 1))
                    continue
                }

                if (this.options.allowDirectFallback && this.proxied) {
                    return this.direct<T>(config)
                }
            }
        }

        if (this.proxied) {
            throw new ProxyError(`Request through proxy failed: ${lastError instanceof Error ? lastError.message : String(lastError)}`, { cause: lastError })
        }
        throw lastError
    }

    private direct<T>(config: AxiosRequestConfig): Promise<AxiosResponse<T>> {
        const bypassInstance = axios.create()
        // ensure axios doesn't try to use its own proxy system when we explicitly bypass
        bypassInstance.defaults.proxy = false
        return bypassInstance.request<T>(config)
    }

    private sleep(ms: number): Promise<void> {
        return new Promise(resolve => setTimeout(resolve, ms))
    }
}

export default AxiosClient
