import { fakerFR } from '@faker-js/faker'

import { AccountProxy, Identity } from '../interface/Account'
import { BrowserEngine } from '../interface/BrowserEngine'
import { FailureReason, SignupResult, SignupState, SignupStep, TerminalSignupState } from '../interface/Provisioning'
import { isProxyFailure, shortErr } from '../util/Errors'
import { proxyLabel } from '../util/Load'
import { log, LogScope } from '../util/Logger'
import { OtpResolver } from './OtpResolver'

type ActiveSignupState = Exclude<SignupState, TerminalSignupState>

export interface SignupContext {
    scope?: LogScope
    /** Checked between steps; once aborted the driver stops before starting the next one */
    stopSignal?: AbortSignal
}

interface Attempt<S> {
    identity: Identity
    proxy: AccountProxy
    scope: LogScope
    session?: S
    submittedAt?: Date
}

export function isTerminal(state: SignupState): state is TerminalSignupState {
    return state.step === 'session-established' || state.step === 'failed' || state.step === 'interrupted'
}

function failed(reason: FailureReason, detail: string, at: SignupStep): SignupState {
    return { step: 'failed', reason, detail, at }
}

/**
 * Drives one signup attempt through an explicit state machine. The driver never retries;
 * every outcome ends in `session-established`, `failed` or `interrupted`.
 */
export class SignupDriver<S> {
    constructor(
        private readonly engine: BrowserEngine<S>,
        private readonly otp: Pick<OtpResolver, 'resolve'>,
        private readonly fullName: () => string = () => fakerFR.person.fullName()
    ) { }

    async run(identity: Identity, proxy: AccountProxy, context: SignupContext = {}): Promise<SignupResult> {
        const attempt: Attempt<S> = { identity, proxy, scope: context.scope ?? 'main' }
        let state: SignupState = { step: 'started' }
        const history: SignupState['step'][] = [state.step]

        log(attempt.scope, 'SIGNUP', `Starting signup for ${identity.email} via ${proxyLabel(proxy)}`)

        try {
            for (;;) {
                if (isTerminal(state)) {
                    this.report(attempt, state)
                    return { state, history }
                }

                // Once the code is accepted the remote account exists, so its capture still runs on stop
                const interrupt: boolean | undefined = context.stopSignal?.aborted && state.step !== 'code-verified'
                state = interrupt
                    ? { step: 'interrupted', at: state.step }
                    : await this.step(state, attempt)
                history.push(state.step)
            }
        } finally {
            if (attempt.session !== undefined) {
                await this.engine.close(attempt.session).catch((error: unknown) => {
                    log(attempt.scope, 'SIGNUP', `Failed to close browser session: ${shortErr(error)}`, 'warn')
                })
            }
        }
    }

    private async step(state: ActiveSignupState, attempt: Attempt<S>): Promise<SignupState> {
        try {
            return await this.advance(state, attempt)
        } catch (error) {
            if (isProxyFailure(error)) {
                return failed('proxy-error', shortErr(error), state.step)
            }
            return failed('unexpected-response', shortErr(error), state.step)
        }
    }

    private async advance(state: ActiveSignupState, attempt: Attempt<S>): Promise<SignupState> {
        switch (state.step) {
            case 'started': {
                const session = await this.engine.open(attempt.proxy)
                attempt.session = session
                attempt.submittedAt = new Date()

                const outcome = await this.engine.submit(session, 'registration', {
                    name: this.fullName(),
                    email: attempt.identity.email,
                    password: attempt.identity.password,
                    passwordCheck: attempt.identity.password
                })
                if (outcome.status === 'rejected') return failed('form-rejected', outcome.message, state.step)
                return { step: 'form-submitted' }
            }

            case 'form-submitted': {
                const page = await this.engine.read(this.session(attempt))
                switch (page.kind) {
                    case 'verification-required':
                        return { step: 'awaiting-code', since: attempt.submittedAt ?? new Date() }
                    case 'rejected':
                        return failed('form-rejected', page.message, state.step)
                    case 'authenticated':
                        return failed('unexpected-response', 'Signed in without a verification step', state.step)
                    case 'unknown':
                        return failed('unexpected-response', page.detail, state.step)
                }
            }

            case 'awaiting-code': {
                const result = await this.otp.resolve(attempt.identity, { since: state.since, scope: attempt.scope })
                if (result.status === 'timeout') {
                    const reasons = Object.entries(result.failures).map(([channel, reason]) => `${channel}: ${reason}`)
                    return failed('otp-timeout', reasons.length ? reasons.join('; ') : 'No code before the deadline', state.step)
                }

                log(attempt.scope, 'OTP', `Received code from ${result.channel}`)
                const outcome = await this.engine.submit(this.session(attempt), 'verification', { code: result.code })
                if (outcome.status === 'rejected') return failed('otp-rejected', outcome.message, state.step)
                return { step: 'code-verified', code: result.code, channel: result.channel }
            }

            case 'code-verified': {
                const session = this.session(attempt)
                const page = await this.engine.read(session)
                switch (page.kind) {
                    case 'authenticated':
                        return { step: 'session-established', artifact: await this.engine.capture(session) }
                    case 'rejected':
                        return failed('otp-rejected', page.message, state.step)
                    case 'verification-required':
                        return failed('unexpected-response', 'Verification requested again', state.step)
                    case 'unknown':
                        return failed('unexpected-response', page.detail, state.step)
                }
            }
        }
    }

    private session(attempt: Attempt<S>): S {
        if (attempt.session === undefined) throw new Error('Browser session is not open')
        return attempt.session
    }

    private report(attempt: Attempt<S>, state: TerminalSignupState): void {
        const email = attempt.identity.email
        switch (state.step) {
            case 'session-established':
                log(attempt.scope, 'SIGNUP', `Session established for ${email}`, 'log', 'green')
                break
            case 'failed':
                log(attempt.scope, 'SIGNUP', `Signup failed for ${email} at ${state.at}: ${state.reason} (${state.detail})`, 'warn')
                break
            case 'interrupted':
                log(attempt.scope, 'SIGNUP', `Signup for ${email} interrupted at ${state.at}`, 'warn')
                break
        }
    }
}
