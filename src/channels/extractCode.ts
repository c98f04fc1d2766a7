import { load } from 'cheerio'

// Markup-anchored patterns, matched against raw HTML only
const HTML_PATTERNS: readonly RegExp[] = [
    /class="data">\s*(\d{6})\s*</i,
    />\s*(\d{6})\s*<\/td>/i
]

// Ordered from most to least specific; the first hit wins
const TEXT_PATTERNS: readonly RegExp[] = [
    /(?:verification|one[-\s]?time|security|single[-\s]?use)\s+code\s*(?:is|:)?\s*[:\-\s]*(\d{4,8})\b/i,
    /(?:code\s*(?:is|:)|is:)\s*(\d{4,8})\b/i,
    /:\s*(\d{6})\b/,
    /\b(\d{6})\b/
]

/** Visible text of an HTML body (scripts/styles dropped, whitespace collapsed) */
export function htmlToText(html: string): string {
    const $ = load(html)
    $('script, style, head').remove()
    return $.root().text().replace(/\u00A0/g, ' ').replace(/[ \t\r]+/g, ' ').replace(/\n\s*\n+/g, '\n').trim()
}

function firstMatch(patterns: readonly RegExp[], sources: string[]): string | null {
    for (const pattern of patterns) {
        for (const source of sources) {
            const code = pattern.exec(source)?.[1]?.trim()
            if (code && /^\d{4,8}$/.test(code)) return code
        }
    }
    return null
}

/** Pull a verification code out of a message's plain-text and/or HTML body */
export function extractCode(text: string, html?: string | false): string | null {
    if (html) {
        const anchored = firstMatch(HTML_PATTERNS, [html])
        if (anchored) return anchored
    }

    const texts: string[] = []
    if (html) texts.push(htmlToText(html))
    if (text) texts.push(text)

    return firstMatch(TEXT_PATTERNS, texts)
}

/** SMS providers return either the bare code or the whole message text */
export function extractSmsCode(sms: string): string | null {
    const trimmed = sms.trim()
    if (/^[A-Za-z0-9]{4,8}$/.test(trimmed)) return trimmed
    return extractCode(trimmed)
}
