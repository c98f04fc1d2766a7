import { Identity } from '../interface/Account'
import { ChannelPoll, MailboxChannel, SmsAcquire, SmsChannel } from '../interface/Channels'
import { OtpChannelName } from '../interface/Provisioning'
import { shortErr } from '../util/Errors'
import { log, LogScope } from '../util/Logger'
import Util from '../util/Utils'

export type OtpResult =
    | { status: 'code'; code: string; channel: OtpChannelName }
    | { status: 'timeout'; failures: Partial<Record<OtpChannelName, string>> }

export interface OtpChannels {
    mailbox?: MailboxChannel
    sms?: SmsChannel
}

export interface OtpTimings {
    deadlineMs: number
    mailboxIntervalMs: number
    smsIntervalMs: number
}

export interface OtpRequest {
    /** Earliest receipt time a mailbox code may have */
    since: Date
    deadlineMs?: number
    /** Worker label for logs */
    scope?: LogScope
}

type LoopOutcome =
    | { status: 'code'; code: string }
    | { status: 'failed'; reason: string }
    | { status: 'stopped' }

export class OtpResolver {
    private utils = new Util()

    constructor(private readonly channels: OtpChannels, private readonly timings: OtpTimings) { }

    get hasChannels(): boolean {
        return this.channels.mailbox !== undefined || this.channels.sms !== undefined
    }

    /**
     * Race the mailbox and SMS loops for one identity. The first code wins and the other
     * loop is aborted; codes that arrive before the zero-delay settle timer fires are
     * compared and the mailbox one is kept.
     */
    resolve(identity: Identity, request: OtpRequest): Promise<OtpResult> {
        const scope = request.scope ?? 'main'
        const deadlineMs = request.deadlineMs ?? this.timings.deadlineMs
        const deadline = Date.now() + deadlineMs
        const controller = new AbortController()
        const failures: Partial<Record<OtpChannelName, string>> = {}

        if (!this.hasChannels) {
            log(scope, 'OTP', 'No verification channel configured', 'warn')
            return Promise.resolve({ status: 'timeout', failures })
        }

        return new Promise<OtpResult>(resolve => {
            let settled = false
            let winner: { code: string; channel: OtpChannelName } | undefined
            let settleTimer: NodeJS.Timeout | undefined

            const finish = (result: OtpResult) => {
                if (settled) return
                settled = true
                clearTimeout(deadlineTimer)
                if (settleTimer) clearTimeout(settleTimer)
                controller.abort()
                resolve(result)
            }

            const timeout = (): OtpResult => ({ status: 'timeout', failures })

            const onOutcome = (channel: OtpChannelName, outcome: LoopOutcome) => {
                if (settled) return

                if (outcome.status === 'failed') {
                    failures[channel] = outcome.reason
                    log(scope, 'OTP', `${channel} channel failed: ${outcome.reason}`, 'warn')
                    return
                }
                if (outcome.status !== 'code') return

                if (!winner || (channel === 'mailbox' && winner.channel !== 'mailbox')) {
                    winner = { code: outcome.code, channel }
                }
                if (!settleTimer) {
                    settleTimer = setTimeout(() => {
                        if (winner) finish({ status: 'code', ...winner })
                    }, 0)
                }
            }

            const deadlineTimer = setTimeout(() => finish(winner ? { status: 'code', ...winner } : timeout()), deadlineMs)

            const loops: Promise<void>[] = []
            const { mailbox, sms } = this.channels

            if (mailbox) {
                loops.push(this.mailboxLoop(mailbox, identity, request.since, deadline, controller.signal)
                    .then(outcome => onOutcome('mailbox', outcome)))
            }
            if (sms) {
                loops.push(this.smsLoop(sms, identity, deadline, controller.signal)
                    .then(outcome => onOutcome('sms', outcome)))
            }

            // Every loop ended without a code (failures or deadline): nothing left to wait for
            void Promise.all(loops).then(() => {
                if (!winner) finish(timeout())
            })
        })
    }

    private mailboxLoop(channel: MailboxChannel, identity: Identity, since: Date, deadline: number, signal: AbortSignal): Promise<LoopOutcome> {
        return this.pollLoop(() => channel.poll(identity, since, signal), this.timings.mailboxIntervalMs, deadline, signal)
    }

    private async smsLoop(channel: SmsChannel, identity: Identity, deadline: number, signal: AbortSignal): Promise<LoopOutcome> {
        let acquired: SmsAcquire
        try {
            acquired = await channel.acquire(identity, signal)
        } catch (error) {
            return { status: 'failed', reason: shortErr(error) }
        }
        if (signal.aborted) return { status: 'stopped' }
        if (acquired.status === 'failed') return acquired

        const { requestId } = acquired.request
        return this.pollLoop(() => channel.poll(requestId, signal), this.timings.smsIntervalMs, deadline, signal)
    }

    private async pollLoop(poll: () => Promise<ChannelPoll>, intervalMs: number, deadline: number, signal: AbortSignal): Promise<LoopOutcome> {
        while (!signal.aborted && Date.now() < deadline) {
            let result: ChannelPoll
            try {
                result = await poll()
            } catch (error) {
                result = { status: 'failed', reason: shortErr(error) }
            }

            // Cancelled while the poll was in flight: its result is discarded
            if (signal.aborted) return { status: 'stopped' }
            if (result.status === 'code') return { status: 'code', code: result.code }
            if (result.status === 'failed') return { status: 'failed', reason: result.reason }

            const remaining = deadline - Date.now()
            if (remaining <= 0) break
            await this.utils.wait(Math.min(intervalMs, remaining), signal)
        }

        return { status: 'stopped' }
    }
}
