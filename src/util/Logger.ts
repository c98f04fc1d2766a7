import chalk from 'chalk'

import { ConfigLogging } from '../interface/Config'

export type LogLevel = 'log' | 'warn' | 'error'

/** 'main' for the runner itself, otherwise a worker label such as "W1" */
export type LogScope = 'main' | string

type ChalkColor = 'red' | 'green' | 'yellow' | 'blue' | 'magenta' | 'cyan' | 'white' | 'gray'

let loggingCfg: ConfigLogging = { excludeFunc: [], redactEmails: false }

export function configureLogger(cfg: Partial<ConfigLogging>): void {
    loggingCfg = {
        excludeFunc: Array.isArray(cfg.excludeFunc) ? cfg.excludeFunc : [],
        redactEmails: cfg.redactEmails === true
    }
}

export function redactEmails(s: string): string {
    return s.replace(/[A-Z0-9._%+-]+@[A-Z0-9.-]+\.[A-Z]{2,}/ig, (m) => {
        const [u, d] = m.split('@'); return `${(u || '').slice(0, 2)}***@${d || ''}`
    })
}

// ASCII-safe icon map for PowerShell compatibility
const ICON_MAP: Array<[RegExp, string]> = [
    [/error|fail/i, '[ERROR]'],
    [/warn/i, '[WARN]'],
    [/success|complet|established/i, '[OK]'],
    [/proxy/i, '[PROXY]'],
    [/otp|mailbox|sms/i, '[OTP]'],
    [/signup/i, '[SIGNUP]'],
    [/store|session/i, '[STORE]'],
    [/browser/i, '[BROWSER]'],
    [/main/i, '[MAIN]']
]

/**
 * Synchronous logger that returns an Error when type === 'error' so callers can `throw log(...)` safely.
 *
 * scope: 'main' | worker label
 * title: short title/category of the log (used for exclusion checks)
 * message: full human-readable message
 * type: 'log' | 'warn' | 'error'
 * color: optional chalk color applied to the whole line
 */
export function log(
    scope: LogScope,
    title: string,
    message: string,
    type: LogLevel = 'log',
    color?: ChalkColor
): Error | void {
    if (loggingCfg.excludeFunc.some(x => x.toLowerCase() === title.toLowerCase())) {
        return
    }

    const currentTime = new Date().toLocaleString()
    const scopeText = scope === 'main' ? 'MAIN' : scope.toUpperCase()
    const redact = (s: string) => loggingCfg.redactEmails ? redactEmails(s) : s
    const cleanStr = redact(`[${currentTime}] [PID: ${process.pid}] [${type.toUpperCase()}] ${scopeText} [${title}] ${message}`)

    // Console formatting & icons
    const typeIndicator = type === 'error' ? '✗' : type === 'warn' ? '⚠' : '✓'
    const scopeColor = scope === 'main' ? chalk.cyan : chalk.magenta
    const typeColor = type === 'error' ? chalk.red : type === 'warn' ? chalk.yellow : chalk.green

    let icon = ''
    for (const [pattern, symbol] of ICON_MAP) {
        if (pattern.test(title) || pattern.test(message)) {
            icon = chalk.dim(symbol)
            break
        }
    }
    const iconPart = icon ? icon + ' ' : ''

    const formattedStr = [
        chalk.gray(`[${currentTime}]`),
        chalk.gray(`[${process.pid}]`),
        typeColor(`${typeIndicator}`),
        scopeColor(`[${scopeText}]`),
        chalk.bold(`[${title}]`),
        iconPart + redact(message)
    ].join(' ')

    const line = color ? chalk[color](formattedStr) : formattedStr

    switch (type) {
        case 'warn':
            console.warn(line)
            break
        case 'error':
            console.error(line)
            break
        default:
            console.log(line)
            break
    }

    // Return an Error when logging an error so callers can `throw log(...)`
    if (type === 'error') {
        return new Error(cleanStr)
    }
}
