import { ImapFlow } from 'imapflow'
import { simpleParser } from 'mailparser'

import { Identity } from '../interface/Account'
import { ChannelPoll, MailboxChannel } from '../interface/Channels'
import { ConfigImap } from '../interface/Config'
import { shortErr } from '../util/Errors'
import { log } from '../util/Logger'
import { extractCode } from './extractCode'

// Tolerated difference between the mail server's Date header and our clock
const CLOCK_SKEW_MS = 2 * 60 * 1000

function startOfDay(date: Date): Date {
    return new Date(date.getFullYear(), date.getMonth(), date.getDate())
}

/**
 * Mailbox channel over one shared IMAP connection (catch-all or forwarding inbox).
 * Workers poll concurrently; the mailbox lock serializes their searches.
 */
export class ImapMailbox implements MailboxChannel {
    private client?: ImapFlow
    private connecting?: Promise<ImapFlow>

    constructor(private readonly cfg: ConfigImap) { }

    private connection(): Promise<ImapFlow> {
        if (this.client) return Promise.resolve(this.client)

        if (!this.connecting) {
            const client = new ImapFlow({
                host: this.cfg.host,
                port: this.cfg.port,
                secure: this.cfg.secure,
                auth: { user: this.cfg.user, pass: this.cfg.password },
                logger: false
            })
            client.on('close', () => {
                if (this.client === client) this.client = undefined
            })
            client.on('error', (err: Error) => {
                log('main', 'MAILBOX', `IMAP connection error: ${shortErr(err)}`, 'warn')
            })

            this.connecting = client.connect()
                .then(() => {
                    this.client = client
                    log('main', 'MAILBOX', `Connected to ${this.cfg.host} as ${this.cfg.user}`)
                    return client
                })
                .finally(() => { this.connecting = undefined })
        }

        return this.connecting
    }

    async poll(identity: Identity, since: Date, signal: AbortSignal): Promise<ChannelPoll> {
        if (signal.aborted) return { status: 'none' }

        let client: ImapFlow
        try {
            client = await this.connection()
        } catch (error) {
            return { status: 'failed', reason: `IMAP connect failed: ${shortErr(error)}` }
        }

        try {
            const lock = await client.getMailboxLock(this.cfg.mailbox)
            try {
                const found = await client.search({ to: identity.email, seen: false, since: startOfDay(since) }, { uid: true })
                if (!Array.isArray(found) || found.length === 0) return { status: 'none' }

                // Newest first
                const uids = [...found].sort((a, b) => b - a)
                for (const uid of uids) {
                    if (signal.aborted) return { status: 'none' }

                    const message = await client.fetchOne(String(uid), { source: true }, { uid: true })
                    if (!message || !message.source) continue

                    const parsed = await simpleParser(message.source)
                    if (parsed.date && parsed.date.getTime() < since.getTime() - CLOCK_SKEW_MS) continue

                    const code = extractCode(parsed.text ?? '', parsed.html)
                    if (!code) continue

                    await client.messageFlagsAdd(String(uid), ['\\Seen'], { uid: true })
                    return { status: 'code', code }
                }

                return { status: 'none' }
            } finally {
                lock.release()
            }
        } catch (error) {
            // Other workers share the connection; only forget it once the server dropped it
            if (!client.usable && this.client === client) this.client = undefined
            log('main', 'MAILBOX', `IMAP query for ${identity.email} failed: ${shortErr(error)}`, 'warn')
            return { status: 'none' }
        }
    }

    async close(): Promise<void> {
        const client = this.client
        this.client = undefined
        if (client) {
            await client.logout()
        }
    }
}
