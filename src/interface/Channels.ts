import { Identity } from './Account'

export type ChannelPoll =
    | { status: 'code'; code: string }
    | { status: 'none' }
    | { status: 'failed'; reason: string }

export interface MailboxChannel {
    /** Look for a verification code addressed to the identity, received at or after `since` */
    poll(identity: Identity, since: Date, signal: AbortSignal): Promise<ChannelPoll>
    close?(): Promise<void>
}

export interface SmsRequest {
    requestId: string;
    phoneNumber: string;
}

export type SmsAcquire =
    | { status: 'acquired'; request: SmsRequest }
    | { status: 'failed'; reason: string }

export interface SmsChannel {
    /** Rent a number for the identity; called once before polling starts */
    acquire(identity: Identity, signal: AbortSignal): Promise<SmsAcquire>
    poll(requestId: string, signal: AbortSignal): Promise<ChannelPoll>
}
