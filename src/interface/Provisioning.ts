import { AccountProxy, Identity, SessionArtifact } from './Account'

export type FailureReason =
    | 'proxy-error'
    | 'form-rejected'
    | 'otp-timeout'
    | 'otp-rejected'
    | 'unexpected-response'

/** Reasons a task can end permanently without ever reaching the signup driver's own failure set */
export type PermanentReason = FailureReason | 'no-proxy' | 'store-error'

export type OtpChannelName = 'mailbox' | 'sms'

export type SignupStep =
    | 'started'
    | 'form-submitted'
    | 'awaiting-code'
    | 'code-verified'
    | 'session-established'

export type SignupState =
    | { step: 'started' }
    | { step: 'form-submitted' }
    | { step: 'awaiting-code'; since: Date }
    | { step: 'code-verified'; code: string; channel: OtpChannelName }
    | { step: 'session-established'; artifact: SessionArtifact }
    | { step: 'failed'; reason: FailureReason; detail: string; at: SignupStep }
    | { step: 'interrupted'; at: SignupStep }

export type TerminalSignupState = Extract<SignupState, { step: 'session-established' | 'failed' | 'interrupted' }>

export interface SignupResult {
    state: TerminalSignupState;
    /** Every state visited, in order, including the terminal one */
    history: SignupState['step'][];
}

export type TaskStatus =
    | 'pending'
    | 'running'
    | 'succeeded'
    | 'retrying'
    | 'failed'
    | 'interrupted'

/** One attempt at provisioning an identity. Retries create a new task value. */
export interface ProvisioningTask {
    readonly id: string;
    readonly identity: Identity;
    /** 1-based attempt number */
    readonly attempt: number;
    readonly proxy?: AccountProxy;
    readonly status: TaskStatus;
    /** Id of the task this one retries */
    readonly previous?: string;
}

export interface TaskRecord {
    id: string;
    email: string;
    attempt: number;
    previous?: string;
    proxy?: string;
    status: TaskStatus;
    reason?: PermanentReason;
    detail?: string;
    history: SignupState['step'][];
    durationMs: number;
}

export interface RunReport {
    runId: string;
    startedAt: string;
    finishedAt: string;
    durationMs: number;
    succeeded: number;
    permanentlyFailed: number;
    interrupted: number;
    /** Set when the run could not continue at all (e.g. every proxy quarantined) */
    fatal?: string;
    /** Failed attempts by reason, retried ones included */
    reasons: Partial<Record<PermanentReason, number>>;
    tasks: TaskRecord[];
}
