import fs from 'fs'
import path from 'path'

import { AccountProxy, Identity } from '../interface/Account'
import { Config, SmsProviderName } from '../interface/Config'
import Util from './Utils'

let configCache: Config | undefined
let configSourcePath = ''

type JsonRecord = Record<string, unknown>

// Basic JSON comment stripper (supports // line and /* block */ comments while preserving strings)
export function stripJsonComments(input: string): string {
    let out = ''
    let inString = false
    let stringChar = ''
    let inLine = false
    let inBlock = false
    for (let i = 0; i < input.length; i++) {
        const ch = input.charAt(i)
        const next = input.charAt(i + 1)
        if (inLine) {
            if (ch === '\n' || ch === '\r') {
                inLine = false
                out += ch
            }
            continue
        }
        if (inBlock) {
            if (ch === '*' && next === '/') {
                inBlock = false
                i++
            }
            continue
        }
        if (inString) {
            out += ch
            if (ch === '\\') { // escape next char
                i++
                if (i < input.length) out += input.charAt(i)
                continue
            }
            if (ch === stringChar) {
                inString = false
            }
            continue
        }
        if (ch === '"' || ch === '\'') {
            inString = true
            stringChar = ch
            out += ch
            continue
        }
        if (ch === '/' && next === '/') {
            inLine = true
            i++
            continue
        }
        if (ch === '/' && next === '*') {
            inBlock = true
            i++
            continue
        }
        out += ch
    }
    return out
}

export function isRecord(value: unknown): value is JsonRecord {
    return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function asRecord(value: unknown): JsonRecord {
    return isRecord(value) ? value : {}
}

function str(value: unknown, fallback: string): string {
    return typeof value === 'string' ? value : fallback
}

function num(value: unknown, fallback: number): number {
    const n = typeof value === 'string' && value.trim() ? Number(value) : value
    return typeof n === 'number' && Number.isFinite(n) ? n : fallback
}

function bool(value: unknown, fallback: boolean): boolean {
    return typeof value === 'boolean' ? value : fallback
}

function duration(value: unknown, fallback: number | string): number | string {
    return typeof value === 'number' || typeof value === 'string' ? value : fallback
}

// Each provider numbers countries and services its own way
const SMS_DEFAULTS: Record<SmsProviderName, { country: string; service: string; maxPrice: string }> = {
    smspool: { country: 'GB', service: '39', maxPrice: '0.20' },
    herosms: { country: '16', service: 'am', maxPrice: '0.11' },
    none: { country: '', service: '', maxPrice: '' }
}

function smsProvider(value: unknown): SmsProviderName {
    const v = typeof value === 'string' ? value.toLowerCase().replace(/[^a-z]/g, '') : ''
    if (v === 'smspool' || v === 'herosms') return v
    return 'none'
}

// Normalize both legacy (flat) and nested config schemas into the Config interface
export function normalizeConfig(raw: unknown): Config {
    const n = asRecord(raw)

    const browser = asRecord(n.browser)
    const execution = asRecord(n.execution)
    const identities = asRecord(n.identities)
    const proxyPool = asRecord(n.proxyPool)
    const backoff = asRecord(proxyPool.leaseBackoff)
    const check = asRecord(proxyPool.check)
    const otp = asRecord(n.otp)
    const imap = asRecord(n.imap)
    const sms = asRecord(n.sms)
    const provider = smsProvider(sms.provider)
    const target = asRecord(n.target)
    const selectors = asRecord(target.selectors)
    const logging = asRecord(n.logging)
    const notifications = asRecord(n.notifications)
    const webhook = asRecord(notifications.webhook ?? n.webhook)
    const reports = asRecord(n.reports)

    const amountRaw = num(execution.amount ?? n.amount, 0)
    const imapHost = str(imap.host ?? imap.server, '')

    const cfg: Config = {
        sessionPath: str(n.sessionPath, '.accounts'),
        headless: bool(browser.headless ?? n.headless, false),
        globalTimeout: duration(browser.globalTimeout ?? n.globalTimeout, '30s'),
        execution: {
            workers: Math.max(1, Math.floor(num(execution.workers ?? n.workers ?? n.threads, 2))),
            retryBound: Math.max(0, Math.floor(num(execution.retryBound ?? n.retryBound, 1))),
            shuffle: bool(execution.shuffle, true),
            amount: amountRaw > 0 ? Math.floor(amountRaw) : undefined
        },
        identities: {
            emailsFile: str(identities.emailsFile, 'emails.txt'),
            proxiesFile: str(identities.proxiesFile, 'proxies.txt'),
            defaultPassword: str(identities.defaultPassword ?? n.password, ''),
            skipUsed: bool(identities.skipUsed, true)
        },
        proxyPool: {
            failureThreshold: Math.max(1, Math.floor(num(proxyPool.failureThreshold, 3))),
            leaseBackoff: {
                baseDelay: duration(backoff.baseDelay, '1s'),
                maxDelay: duration(backoff.maxDelay, '15s')
            },
            check: {
                enabled: bool(check.enabled, true),
                url: str(check.url, 'https://www.amazon.fr/'),
                timeout: duration(check.timeout, '4s'),
                concurrency: Math.max(1, Math.floor(num(check.concurrency, 10)))
            }
        },
        otp: {
            deadline: duration(otp.deadline, '8min'),
            mailboxInterval: duration(otp.mailboxInterval, '3s'),
            smsInterval: duration(otp.smsInterval, '5s')
        },
        imap: {
            enabled: bool(imap.enabled, imapHost.length > 0),
            host: imapHost,
            port: num(imap.port, 993),
            secure: bool(imap.secure, true),
            user: str(imap.user ?? imap.email, ''),
            // app passwords are often pasted with spaces
            password: str(imap.password, '').replace(/ /g, ''),
            mailbox: str(imap.mailbox, 'INBOX')
        },
        sms: {
            provider,
            apiKey: str(sms.apiKey, ''),
            country: str(sms.country, SMS_DEFAULTS[provider].country),
            service: str(sms.service, SMS_DEFAULTS[provider].service),
            maxPrice: str(sms.maxPrice, SMS_DEFAULTS[provider].maxPrice)
        },
        target: {
            signupUrl: str(target.signupUrl, ''),
            homeUrl: str(target.homeUrl, str(target.signupUrl, '')),
            stateTimeout: duration(target.stateTimeout, '60s'),
            typingDelay: Math.max(0, num(target.typingDelay, 80)),
            selectors: {
                name: str(selectors.name, '#ap_customer_name'),
                email: str(selectors.email, '#ap_email'),
                password: str(selectors.password, '#ap_password'),
                passwordCheck: typeof selectors.passwordCheck === 'string' ? selectors.passwordCheck : '#ap_password_check',
                registrationSubmit: str(selectors.registrationSubmit, '#continue'),
                codeInput: str(selectors.codeInput, '#cvf-input-code'),
                codeSubmit: str(selectors.codeSubmit, '#cvf-submit-otp-button'),
                error: str(selectors.error, '.a-alert-error'),
                authenticated: str(selectors.authenticated, '#nav-link-accountList')
            }
        },
        logging: {
            excludeFunc: Array.isArray(logging.excludeFunc)
                ? logging.excludeFunc.filter((x): x is string => typeof x === 'string')
                : [],
            redactEmails: bool(logging.redactEmails, false)
        },
        webhook: {
            enabled: bool(webhook.enabled, false),
            url: str(webhook.url, ''),
            username: typeof webhook.username === 'string' ? webhook.username : undefined,
            avatarUrl: typeof webhook.avatarUrl === 'string' ? webhook.avatarUrl : undefined
        },
        reports: {
            enabled: bool(reports.enabled, true),
            dir: str(reports.dir, 'reports')
        }
    }

    return cfg
}

export function getConfigPath(): string { return configSourcePath }

/**
 * Load and cache config.jsonc / config.json from the usual locations.
 * An explicit path (or CONFIG_FILE env) skips the search.
 */
export function loadConfig(explicitPath?: string): Config {
    try {
        if (configCache && !explicitPath) {
            return configCache
        }

        const names = ['config.jsonc', 'config.json']
        const bases = [
            path.join(__dirname, '../'),       // dist root when compiled
            path.join(__dirname, '../../'),    // repo root
            process.cwd(),                     // cwd
            path.join(process.cwd(), 'src'),   // repo/src
            __dirname                          // dist/util
        ]
        const forced = explicitPath ?? process.env.CONFIG_FILE
        const candidates: string[] = forced
            ? [path.isAbsolute(forced) ? forced : path.join(process.cwd(), forced)]
            : bases.flatMap(base => names.map(name => path.join(base, name)))

        const cfgPath = candidates.find(p => fs.existsSync(p))
        if (!cfgPath) throw new Error(`config not found in: ${candidates.join(' | ')}`)

        const text = fs.readFileSync(cfgPath, 'utf-8').replace(/^\uFEFF/, '') // strip BOM if present
        const normalized = normalizeConfig(JSON.parse(stripJsonComments(text)))

        // Environment override for the worker count
        if (process.env.WORKERS !== undefined) {
            const w = Number(process.env.WORKERS)
            if (Number.isFinite(w) && w >= 1) {
                normalized.execution.workers = Math.floor(w)
            } else {
                console.warn('[WARN] WORKERS env var invalid:', process.env.WORKERS)
            }
        }
        if (process.env.FORCE_HEADLESS === '1') normalized.headless = true

        configCache = normalized
        configSourcePath = cfgPath

        return normalized
    } catch (error) {
        console.error('[ERROR] loadConfig failed:', error)
        if (error instanceof Error) throw error
        throw new Error(String(error))
    }
}

/* ---------------------------
   Identity & proxy lists
   --------------------------- */

const EMAIL_RE = /^[^\s@:]+@[^\s@:]+\.[^\s@:]+$/

export function normalizeEmail(email: string): string {
    return email.trim().toLowerCase()
}

/**
 * One identity per line: `email` or `email:password`.
 * Blank lines and `#` comments are ignored; duplicates keep the first occurrence.
 */
export function parseIdentityLines(text: string, defaultPassword: string): { identities: Identity[]; skipped: string[] } {
    const identities: Identity[] = []
    const skipped: string[] = []
    const seen = new Set<string>()

    for (const rawLine of text.split(/\r?\n/)) {
        const line = rawLine.trim()
        if (!line || line.startsWith('#')) continue

        const sep = line.indexOf(':')
        const email = (sep >= 0 ? line.slice(0, sep) : line).trim()
        const password = sep >= 0 ? line.slice(sep + 1) : defaultPassword

        if (!EMAIL_RE.test(email) || !password) {
            skipped.push(line)
            continue
        }

        const key = normalizeEmail(email)
        if (seen.has(key)) continue
        seen.add(key)

        identities.push({ email, password })
    }

    return { identities, skipped }
}

/**
 * `host:port` or `host:port:username:password`; the host may carry a scheme
 * (http://, socks5://). The password may itself contain ':'.
 */
export function parseProxyLine(line: string): AccountProxy | null {
    const s = line.trim()
    if (!s || s.startsWith('#')) return null

    const schemeMatch = /^([a-z][a-z0-9+.-]*):\/\//i.exec(s)
    const scheme = schemeMatch ? schemeMatch[0] : ''
    const rest = s.slice(scheme.length)

    const parts = rest.split(':')
    if (parts.length !== 2 && parts.length < 4) return null

    const [host = '', portRaw = '', username = ''] = parts
    const password = parts.length >= 4 ? parts.slice(3).join(':') : ''
    const port = Number(portRaw)

    if (!host || !Number.isInteger(port) || port < 1 || port > 65535) return null
    if (parts.length >= 4 && !username) return null

    return {
        proxyAxios: true,
        url: `${scheme}${host}`,
        port,
        username,
        password
    }
}

/** Full proxy string as it appears in the proxies file; stored with each account */
export function formatProxy(proxy: AccountProxy): string {
    return proxy.username
        ? `${proxy.url}:${proxy.port}:${proxy.username}:${proxy.password}`
        : `${proxy.url}:${proxy.port}`
}

/** Credential-free label for logs */
export function proxyLabel(proxy: AccountProxy): string {
    return `${proxy.url}:${proxy.port}`
}

export async function loadIdentities(file: string, defaultPassword: string): Promise<{ identities: Identity[]; skipped: string[] }> {
    const text = await fs.promises.readFile(file, 'utf-8')
    return parseIdentityLines(text.replace(/^\uFEFF/, ''), defaultPassword)
}

/** Reads the proxies file; creates it empty when missing so the user knows where to put proxies */
export async function loadProxies(file: string): Promise<{ proxies: AccountProxy[]; skipped: string[] }> {
    if (!fs.existsSync(file)) {
        await fs.promises.mkdir(path.dirname(path.resolve(file)), { recursive: true })
        await fs.promises.writeFile(file, '', 'utf-8')
    }

    const text = await fs.promises.readFile(file, 'utf-8')
    const proxies: AccountProxy[] = []
    const skipped: string[] = []
    const seen = new Set<string>()

    for (const rawLine of text.replace(/^\uFEFF/, '').split(/\r?\n/)) {
        const line = rawLine.trim()
        if (!line || line.startsWith('#')) continue

        const proxy = parseProxyLine(line)
        if (!proxy) {
            skipped.push(line)
            continue
        }

        const key = formatProxy(proxy)
        if (seen.has(key)) continue
        seen.add(key)
        proxies.push(proxy)
    }

    return { proxies, skipped }
}

/** Resolve every duration of the config to milliseconds once */
export function resolveDurations(config: Config, utils: Util = new Util()) {
    return {
        globalTimeout: utils.stringToMs(config.globalTimeout),
        leaseBaseDelay: utils.stringToMs(config.proxyPool.leaseBackoff.baseDelay),
        leaseMaxDelay: utils.stringToMs(config.proxyPool.leaseBackoff.maxDelay),
        proxyCheckTimeout: utils.stringToMs(config.proxyPool.check.timeout),
        otpDeadline: utils.stringToMs(config.otp.deadline),
        mailboxInterval: utils.stringToMs(config.otp.mailboxInterval),
        smsInterval: utils.stringToMs(config.otp.smsInterval),
        stateTimeout: utils.stringToMs(config.target.stateTimeout)
    }
}

export type ResolvedDurations = ReturnType<typeof resolveDurations>
