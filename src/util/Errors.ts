/** Raised by browser/network layers when the leased proxy is the cause of the failure */
export class ProxyError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options)
        this.name = 'ProxyError'
    }
}

const PROXY_FAILURE_PATTERNS: readonly RegExp[] = [
    /ERR_PROXY_CONNECTION_FAILED/i,
    /ERR_TUNNEL_CONNECTION_FAILED/i,
    /ERR_PROXY_AUTH/i,
    /ERR_SOCKS_CONNECTION_FAILED/i,
    /ERR_CONNECTION_(?:REFUSED|RESET|CLOSED|TIMED_OUT)/i,
    /ERR_TIMED_OUT/i,
    /\b(?:ECONNREFUSED|ECONNRESET|ETIMEDOUT|EHOSTUNREACH|ENOTFOUND)\b/,
    /407 Proxy Authentication Required/i
]

/** `code` of a Node/axios error, or of its cause */
export function errorCode(error: unknown): string {
    if (typeof error !== 'object' || error === null) return ''
    if ('code' in error && typeof error.code === 'string') return error.code
    if ('cause' in error) return errorCode(error.cause)
    return ''
}

export function isProxyFailure(error: unknown): boolean {
    if (error instanceof ProxyError) return true

    const code = errorCode(error)
    const message = error instanceof Error ? error.message : String(error)

    return PROXY_FAILURE_PATTERNS.some(re => re.test(code) || re.test(message))
}

export function shortErr(e: unknown): string {
    if (e == null) return 'unknown'
    if (e instanceof Error) return e.message.substring(0, 120)
    const s = String(e)
    return s.substring(0, 120)
}
