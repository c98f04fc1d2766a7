import { AccountProxy, SessionArtifact } from './Account'

export type SignupForm = 'registration' | 'verification'

export type SubmitOutcome =
    | { status: 'submitted' }
    | { status: 'rejected'; message: string }

export type PageState =
    | { kind: 'verification-required' }
    | { kind: 'authenticated' }
    | { kind: 'rejected'; message: string }
    | { kind: 'unknown'; detail: string }

/**
 * Black-box browser automation used by the signup driver and the account opener.
 * Implementations throw `ProxyError` when the proxy itself is the problem.
 */
export interface BrowserEngine<S = unknown> {
    open(proxy: AccountProxy): Promise<S>
    submit(session: S, form: SignupForm, fields: Record<string, string>): Promise<SubmitOutcome>
    read(session: S): Promise<PageState>
    capture(session: S): Promise<SessionArtifact>
    close(session: S): Promise<void>

    /** Re-open a stored session (cookies + storage) through its proxy, landing on `url` */
    restore(artifact: SessionArtifact, proxy: AccountProxy, url: string, opts?: { headless?: boolean }): Promise<S>

    /** Resolves once the user closes the session's page (interactive opener) */
    waitForClose?(session: S): Promise<void>
}
