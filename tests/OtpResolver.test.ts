import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'

import { OtpResolver, OtpResult } from '../src/functions/OtpResolver'
import { ChannelPoll, MailboxChannel, SmsChannel } from '../src/interface/Channels'
import { makeIdentity } from './fakes'

const identity = makeIdentity(1)

function mailboxFrom(results: Array<ChannelPoll | 'hang'>, delayTicks = 0) {
    const signals: AbortSignal[] = []
    let polls = 0
    const channel: MailboxChannel = {
        async poll(_identity, _since, signal) {
            signals.push(signal)
            const result: ChannelPoll | 'hang' = results[Math.min(polls, results.length - 1)] ?? { status: 'none' }
            polls++
            for (let i = 0; i < delayTicks; i++) await Promise.resolve()
            if (result === 'hang') return new Promise<ChannelPoll>(() => undefined)
            return result
        }
    }
    return { channel, signals, polls: () => polls }
}

function smsFrom(results: ChannelPoll[], acquireFails?: string) {
    const signals: AbortSignal[] = []
    let polls = 0
    const channel: SmsChannel = {
        async acquire() {
            if (acquireFails) return { status: 'failed', reason: acquireFails }
            return { status: 'acquired', request: { requestId: 'order-1', phoneNumber: '447700900000' } }
        },
        async poll(requestId, signal) {
            expect(requestId).toBe('order-1')
            signals.push(signal)
            const result: ChannelPoll = results[Math.min(polls, results.length - 1)] ?? { status: 'none' }
            polls++
            return result
        }
    }
    return { channel, signals, polls: () => polls }
}

function track(promise: Promise<OtpResult>) {
    const state: { result?: OtpResult; at?: number } = {}
    void promise.then(result => {
        state.result = result
        state.at = Date.now()
    })
    return state
}

describe('OtpResolver', () => {
    beforeEach(() => {
        vi.useFakeTimers()
    })

    afterEach(() => {
        vi.useRealTimers()
    })

    it('prefers the mailbox code when both channels report within the same settle window', async () => {
        // SMS answers first; the mailbox answers a few microtasks later, before the settle timer
        const mailbox = mailboxFrom([{ status: 'code', code: '111111' }], 20)
        const sms = smsFrom([{ status: 'code', code: '222222' }])
        const resolver = new OtpResolver({ mailbox: mailbox.channel, sms: sms.channel }, { deadlineMs: 60000, mailboxIntervalMs: 1000, smsIntervalMs: 1000 })

        const state = track(resolver.resolve(identity, { since: new Date() }))
        await vi.advanceTimersByTimeAsync(10)

        expect(state.result).toEqual({ status: 'code', code: '111111', channel: 'mailbox' })
    })

    it('takes the SMS code when the mailbox has nothing', async () => {
        const mailbox = mailboxFrom([{ status: 'none' }])
        const sms = smsFrom([{ status: 'none' }, { status: 'code', code: '424242' }])
        const resolver = new OtpResolver({ mailbox: mailbox.channel, sms: sms.channel }, { deadlineMs: 60000, mailboxIntervalMs: 1000, smsIntervalMs: 2000 })

        const state = track(resolver.resolve(identity, { since: new Date() }))
        await vi.advanceTimersByTimeAsync(2010)

        expect(state.result).toEqual({ status: 'code', code: '424242', channel: 'sms' })
        expect(mailbox.signals.every(signal => signal.aborted)).toBe(true)
    })

    it('times out no later than the deadline plus one interval', async () => {
        const mailbox = mailboxFrom([{ status: 'none' }])
        const sms = smsFrom([{ status: 'none' }])
        const resolver = new OtpResolver({ mailbox: mailbox.channel, sms: sms.channel }, { deadlineMs: 10000, mailboxIntervalMs: 3000, smsIntervalMs: 4000 })

        const start = Date.now()
        const state = track(resolver.resolve(identity, { since: new Date() }))
        await vi.advanceTimersByTimeAsync(20000)

        expect(state.result).toEqual({ status: 'timeout', failures: {} })
        expect(state.at).toBeDefined()
        expect((state.at ?? Infinity) - start).toBeLessThanOrEqual(10000 + 3000)
    })

    it('settles at the deadline even when a poll never returns', async () => {
        const mailbox = mailboxFrom(['hang'])
        const resolver = new OtpResolver({ mailbox: mailbox.channel }, { deadlineMs: 5000, mailboxIntervalMs: 1000, smsIntervalMs: 1000 })

        const start = Date.now()
        const state = track(resolver.resolve(identity, { since: new Date() }))
        await vi.advanceTimersByTimeAsync(4999)
        expect(state.result).toBeUndefined()

        await vi.advanceTimersByTimeAsync(1)
        expect(state.result).toEqual({ status: 'timeout', failures: {} })
        expect(state.at).toBe(start + 5000)
        expect(mailbox.signals[0]?.aborted).toBe(true)
    })

    it('cancels the SMS loop once the mailbox code arrives on its third poll', async () => {
        const interval = 1000
        const mailbox = mailboxFrom([{ status: 'none' }, { status: 'none' }, { status: 'code', code: '135790' }])
        const sms = smsFrom([{ status: 'none' }])
        const resolver = new OtpResolver({ mailbox: mailbox.channel, sms: sms.channel }, { deadlineMs: 5 * interval, mailboxIntervalMs: interval, smsIntervalMs: interval })

        const state = track(resolver.resolve(identity, { since: new Date() }))
        await vi.advanceTimersByTimeAsync(2 * interval + 10)

        expect(state.result).toEqual({ status: 'code', code: '135790', channel: 'mailbox' })
        expect(mailbox.polls()).toBe(3)

        const smsPolls = sms.polls()
        expect(sms.signals.every(signal => signal.aborted)).toBe(true)

        await vi.advanceTimersByTimeAsync(10 * interval)
        expect(sms.polls()).toBe(smsPolls)
        expect(mailbox.polls()).toBe(3)
    })

    it('ends early with both failures when neither channel can deliver', async () => {
        const mailbox = mailboxFrom([{ status: 'failed', reason: 'IMAP connect failed: auth' }])
        const sms = smsFrom([], 'HeroSMS: NO_NUMBERS')
        const resolver = new OtpResolver({ mailbox: mailbox.channel, sms: sms.channel }, { deadlineMs: 60000, mailboxIntervalMs: 1000, smsIntervalMs: 1000 })

        const start = Date.now()
        const state = track(resolver.resolve(identity, { since: new Date() }))
        await vi.advanceTimersByTimeAsync(0)

        expect(state.result).toEqual({
            status: 'timeout',
            failures: { mailbox: 'IMAP connect failed: auth', sms: 'HeroSMS: NO_NUMBERS' }
        })
        expect(state.at).toBe(start)
        expect(sms.polls()).toBe(0)
    })

    it('keeps polling the other channel after one channel fails', async () => {
        const mailbox = mailboxFrom([{ status: 'none' }, { status: 'code', code: '998877' }])
        const sms = smsFrom([], 'SMSPool purchase failed: Insufficient balance')
        const resolver = new OtpResolver({ mailbox: mailbox.channel, sms: sms.channel }, { deadlineMs: 60000, mailboxIntervalMs: 1000, smsIntervalMs: 1000 })

        const state = track(resolver.resolve(identity, { since: new Date() }))
        await vi.advanceTimersByTimeAsync(1010)

        expect(state.result).toEqual({ status: 'code', code: '998877', channel: 'mailbox' })
    })

    it('honours a per-request deadline', async () => {
        const mailbox = mailboxFrom([{ status: 'none' }])
        const resolver = new OtpResolver({ mailbox: mailbox.channel }, { deadlineMs: 60000, mailboxIntervalMs: 1000, smsIntervalMs: 1000 })

        const start = Date.now()
        const state = track(resolver.resolve(identity, { since: new Date(), deadlineMs: 2500 }))
        await vi.advanceTimersByTimeAsync(3000)

        expect(state.result).toEqual({ status: 'timeout', failures: {} })
        expect(state.at).toBe(start + 2500)
    })

    it('times out immediately without any channel', async () => {
        const resolver = new OtpResolver({}, { deadlineMs: 60000, mailboxIntervalMs: 1000, smsIntervalMs: 1000 })

        expect(resolver.hasChannels).toBe(false)
        await expect(resolver.resolve(identity, { since: new Date() })).resolves.toEqual({ status: 'timeout', failures: {} })
    })
})
