import { Browser, BrowserContext, chromium, LaunchOptions, Page } from 'rebrowser-playwright'

import { AccountProxy, SessionArtifact } from '../interface/Account'
import { BrowserEngine, PageState, SignupForm, SubmitOutcome } from '../interface/BrowserEngine'
import { ConfigTarget } from '../interface/Config'
import { isProxyFailure, ProxyError, shortErr } from '../util/Errors'
import { proxyLabel } from '../util/Load'
import { log } from '../util/Logger'

export interface PlaywrightSession {
    browser: Browser
    context: BrowserContext
    page: Page
}

export interface PlaywrightEngineOptions {
    target: ConfigTarget
    headless: boolean
    /** Default timeout for navigation and element actions */
    globalTimeoutMs: number
    /** How long `read` waits for the page to show a known state */
    stateTimeoutMs: number
}

const STATE_POLL_MS = 500
const SETTLE_TIMEOUT_MS = 10000

function proxyServer(proxy: AccountProxy): string {
    const host = /^[a-z][a-z0-9+.-]*:\/\//i.test(proxy.url) ? proxy.url.replace(/^socks5h:\/\//i, 'socks5://') : `http://${proxy.url}`
    return `${host}:${proxy.port}`
}

/** Proxy-looking failures become ProxyError so the caller can blame (and quarantine) the proxy */
function classify(error: unknown, proxy: AccountProxy): unknown {
    if (error instanceof ProxyError || !isProxyFailure(error)) return error
    return new ProxyError(`Proxy ${proxyLabel(proxy)} failed: ${shortErr(error)}`, { cause: error })
}

export class PlaywrightEngine implements BrowserEngine<PlaywrightSession> {
    private readonly proxies = new WeakMap<PlaywrightSession, AccountProxy>()

    constructor(private readonly options: PlaywrightEngineOptions) { }

    async open(proxy: AccountProxy): Promise<PlaywrightSession> {
        return this.start(proxy, this.options.target.signupUrl, this.options.headless)
    }

    async restore(artifact: SessionArtifact, proxy: AccountProxy, url: string, opts: { headless?: boolean } = {}): Promise<PlaywrightSession> {
        return this.start(proxy, url, opts.headless ?? this.options.headless, artifact)
    }

    async submit(session: PlaywrightSession, form: SignupForm, fields: Record<string, string>): Promise<SubmitOutcome> {
        const s = this.options.target.selectors
        const inputs: Array<[string, string]> = form === 'registration'
            ? [[s.name, 'name'], [s.email, 'email'], [s.password, 'password']]
            : [[s.codeInput, 'code']]
        if (form === 'registration' && s.passwordCheck) inputs.push([s.passwordCheck, 'passwordCheck'])

        try {
            for (const [selector, key] of inputs) {
                const value = fields[key]
                if (value === undefined) throw new Error(`Missing ${form} field "${key}"`)
                await this.type(session.page, selector, value)
            }

            await session.page.click(form === 'registration' ? s.registrationSubmit : s.codeSubmit)
            await this.settle(session.page)

            const error = await this.visibleText(session.page, s.error)
            return error !== null ? { status: 'rejected', message: error || 'Form rejected' } : { status: 'submitted' }
        } catch (error) {
            throw classify(error, this.proxyOf(session))
        }
    }

    async read(session: PlaywrightSession): Promise<PageState> {
        const { page } = session
        const s = this.options.target.selectors
        const deadline = Date.now() + this.options.stateTimeoutMs

        try {
            while (Date.now() < deadline) {
                const error = await this.visibleText(page, s.error)
                if (error !== null) return { kind: 'rejected', message: error || 'Rejected without a message' }
                if (await this.visible(page, s.codeInput)) return { kind: 'verification-required' }
                if (await this.visible(page, s.authenticated)) return { kind: 'authenticated' }

                await page.waitForTimeout(STATE_POLL_MS)
            }
        } catch (error) {
            throw classify(error, this.proxyOf(session))
        }

        return { kind: 'unknown', detail: `No known page state at ${page.url()}` }
    }

    async capture(session: PlaywrightSession): Promise<SessionArtifact> {
        const state = await session.context.storageState()
        return {
            cookies: state.cookies.map(c => ({
                name: c.name,
                value: c.value,
                domain: c.domain,
                path: c.path,
                expires: c.expires,
                httpOnly: c.httpOnly,
                secure: c.secure,
                sameSite: c.sameSite
            })),
            origins: state.origins.map(o => ({ origin: o.origin, localStorage: o.localStorage.map(e => ({ name: e.name, value: e.value })) })),
            capturedAt: new Date().toISOString()
        }
    }

    async close(session: PlaywrightSession): Promise<void> {
        this.proxies.delete(session)
        await session.browser.close()
    }

    waitForClose(session: PlaywrightSession): Promise<void> {
        return new Promise<void>(resolve => {
            session.page.once('close', () => resolve())
            session.browser.once('disconnected', () => resolve())
        })
    }

    private async start(proxy: AccountProxy, url: string, headless: boolean, artifact?: SessionArtifact): Promise<PlaywrightSession> {
        const launchOptions: LaunchOptions = {
            headless: process.env.FORCE_HEADLESS === '1' ? true : headless,
            args: [
                '--no-sandbox',
                '--mute-audio',
                '--disable-setuid-sandbox',
                '--disable-blink-features=AutomationControlled'
            ],
            proxy: {
                server: proxyServer(proxy),
                ...(proxy.username ? { username: proxy.username, password: proxy.password } : {})
            }
        }

        let browser: Browser
        try {
            browser = await chromium.launch(launchOptions)
        } catch (error) {
            throw classify(error, proxy)
        }

        try {
            const context = await browser.newContext({
                viewport: { width: 1280, height: 800 },
                ...(artifact ? { storageState: { cookies: artifact.cookies, origins: artifact.origins } } : {})
            })
            context.setDefaultTimeout(this.options.globalTimeoutMs)

            const page = await context.newPage()
            await page.goto(url, { waitUntil: 'domcontentloaded' })

            const session: PlaywrightSession = { browser, context, page }
            this.proxies.set(session, proxy)
            log('main', 'BROWSER', `Opened ${url} via ${proxyLabel(proxy)}`)
            return session
        } catch (error) {
            await browser.close().catch((closeError: unknown) => {
                log('main', 'BROWSER', `Failed to close browser after launch error: ${shortErr(closeError)}`, 'warn')
            })
            throw classify(error, proxy)
        }
    }

    private proxyOf(session: PlaywrightSession): AccountProxy {
        const proxy = this.proxies.get(session)
        if (!proxy) throw new Error('Session was not opened by this engine')
        return proxy
    }

    private async type(page: Page, selector: string, value: string): Promise<void> {
        const input = page.locator(selector).first()
        await input.click()
        await input.fill('')
        await page.keyboard.type(value, { delay: this.options.target.typingDelay })
    }

    private async settle(page: Page): Promise<void> {
        await page.waitForLoadState('networkidle', { timeout: SETTLE_TIMEOUT_MS }).catch((error: unknown) => {
            log('main', 'BROWSER', `Page did not go idle: ${shortErr(error)}`, 'warn')
        })
    }

    private async visible(page: Page, selector: string): Promise<boolean> {
        return page.locator(selector).first().isVisible()
    }

    /** Trimmed text of the first visible match, null when nothing matching is visible */
    private async visibleText(page: Page, selector: string): Promise<string | null> {
        const element = page.locator(selector).first()
        if (!(await element.isVisible())) return null
        return (await element.innerText()).trim()
    }
}
