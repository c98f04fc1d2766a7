import { AccountRecord, SessionArtifact } from '../interface/Account'
import { BrowserEngine } from '../interface/BrowserEngine'
import { AccountStore } from '../storage/AccountStore'
import { isProxyFailure, shortErr } from '../util/Errors'
import { parseProxyLine } from '../util/Load'
import { log } from '../util/Logger'

export type VerifyResult = 'active' | 'failed' | 'unreachable' | 'missing'

type OpenerStore = Pick<AccountStore, 'find' | 'all' | 'save' | 'markStatus'>

/** Re-uses stored sessions: health checks and interactive opening */
export class AccountOpener<S> {
    constructor(
        private readonly engine: BrowserEngine<S>,
        private readonly store: OpenerStore,
        private readonly homeUrl: string
    ) { }

    /** Restore the stored session and check it is still signed in; a dead session marks the account failed */
    async verify(email: string): Promise<VerifyResult> {
        const account = await this.store.find(email)
        if (!account) {
            log('main', 'OPENER', `No stored account for ${email}`, 'warn')
            return 'missing'
        }

        const proxy = parseProxyLine(account.proxy)
        if (!proxy) {
            log('main', 'OPENER', `${account.email}: stored proxy is not usable: "${account.proxy}"`, 'warn')
            await this.store.markStatus(account.email, 'failed')
            return 'failed'
        }

        let authenticated = false
        try {
            const session = await this.engine.restore(account.session, proxy, this.homeUrl, { headless: true })
            try {
                const state = await this.engine.read(session)
                authenticated = state.kind === 'authenticated'
                if (!authenticated) log('main', 'OPENER', `${account.email}: session not signed in (${state.kind})`, 'warn')
            } finally {
                await this.engine.close(session)
            }
        } catch (error) {
            // The session was never checked; its status stays as stored
            const cause = isProxyFailure(error) ? 'proxy unreachable' : 'verification failed'
            log('main', 'OPENER', `${account.email}: ${cause}: ${shortErr(error)}`, 'warn')
            return 'unreachable'
        }

        if (authenticated) {
            log('main', 'OPENER', `${account.email}: session active`, 'log', 'green')
            return 'active'
        }

        await this.store.markStatus(account.email, 'failed')
        return 'failed'
    }

    /** Verify every active account, one at a time */
    async verifyAll(): Promise<Record<string, VerifyResult>> {
        const results: Record<string, VerifyResult> = {}
        const accounts = (await this.store.all()).filter(a => a.status === 'active')

        for (const account of accounts) {
            results[account.email] = await this.verify(account.email)
        }

        const count = (result: VerifyResult) => Object.values(results).filter(r => r === result).length
        log('main', 'OPENER', `Verified ${accounts.length} account(s): ${count('active')} active, ${count('failed')} failed, ${count('unreachable')} unreachable`)
        return results
    }

    /** Open the account in a visible browser until the user closes it, then store the refreshed session */
    async open(email: string): Promise<boolean> {
        const account = await this.store.find(email)
        if (!account) {
            log('main', 'OPENER', `No stored account for ${email}`, 'warn')
            return false
        }
        if (!this.engine.waitForClose) {
            throw log('main', 'OPENER', 'This browser engine cannot be opened interactively', 'error')
        }

        const session = await this.restore(account, false)
        log('main', 'OPENER', `Opened ${account.email}; close the window to save the session`)

        let artifact: SessionArtifact | undefined
        try {
            await this.engine.waitForClose(session)
            artifact = await this.engine.capture(session)
        } catch (error) {
            log('main', 'OPENER', `Could not capture the session of ${account.email}: ${shortErr(error)}`, 'warn')
        } finally {
            await this.engine.close(session).catch((error: unknown) => {
                log('main', 'OPENER', `Failed to close browser: ${shortErr(error)}`, 'warn')
            })
        }

        if (artifact) {
            await this.store.save({ ...account, session: artifact })
            log('main', 'OPENER', `Saved refreshed session for ${account.email}`, 'log', 'green')
        }
        return true
    }

    private async restore(account: AccountRecord, headless: boolean): Promise<S> {
        const proxy = parseProxyLine(account.proxy)
        if (!proxy) {
            throw new Error(`Stored proxy of ${account.email} is not usable: "${account.proxy}"`)
        }
        return this.engine.restore(account.session, proxy, this.homeUrl, { headless })
    }
}
