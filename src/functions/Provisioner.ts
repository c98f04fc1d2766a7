import * as crypto from 'crypto'

import { AccountProxy, AccountRecord, Identity } from '../interface/Account'
import {
    PermanentReason,
    ProvisioningTask,
    RunReport,
    SignupResult,
    TaskRecord,
    TaskStatus
} from '../interface/Provisioning'
import { IdentityFeed } from '../pool/IdentityFeed'
import { ProxyPool } from '../pool/ProxyPool'
import { AccountStore } from '../storage/AccountStore'
import { shortErr } from '../util/Errors'
import { formatProxy, proxyLabel } from '../util/Load'
import { log, LogScope } from '../util/Logger'
import Util from '../util/Utils'
import { SignupContext } from './SignupDriver'

export interface ProvisionerOptions {
    workers: number
    /** Retries allowed per identity after its first attempt */
    retryBound: number
    leaseBaseDelayMs: number
    leaseMaxDelayMs: number
}

export interface ProvisionerDeps {
    pool: ProxyPool
    feed: IdentityFeed
    driver: { run(identity: Identity, proxy: AccountProxy, context?: SignupContext): Promise<SignupResult> }
    store: Pick<AccountStore, 'save'>
}

type TaskOutcome = { next: 'done' } | { next: 'retry' }

/**
 * Runs the identity feed through a fixed set of workers. Each worker pulls one identity,
 * leases a proxy, drives the signup and retries failures (as new task values) on the same worker.
 */
export class Provisioner {
    private readonly utils = new Util()
    private readonly stopController = new AbortController()
    private readonly records: TaskRecord[] = []
    private readonly reasons: Partial<Record<PermanentReason, number>> = {}
    private counts = { succeeded: 0, permanentlyFailed: 0, interrupted: 0 }
    private fatal?: string
    private taskSeq = 0

    constructor(private readonly deps: ProvisionerDeps, private readonly options: ProvisionerOptions) {
        if (!Number.isInteger(options.workers) || options.workers < 1) {
            throw new Error(`workers must be a positive integer, got ${options.workers}`)
        }
        if (!Number.isInteger(options.retryBound) || options.retryBound < 0) {
            throw new Error(`retryBound must be a non-negative integer, got ${options.retryBound}`)
        }
    }

    get stopping(): boolean {
        return this.stopController.signal.aborted
    }

    /** Stop pulling identities; in-flight tasks finish their current step */
    stop(): void {
        if (this.stopping) return
        log('main', 'PROVISIONER', 'Stop requested: finishing in-flight tasks', 'warn')
        this.stopController.abort()
    }

    async run(): Promise<RunReport> {
        const runId = crypto.randomBytes(4).toString('hex')
        const startedAt = new Date()

        log('main', 'PROVISIONER', `Run ${runId}: ${this.deps.feed.size} identities, ${this.deps.pool.size} proxies, ${this.options.workers} worker(s)`)

        const workers = Array.from({ length: this.options.workers }, (_, i) => this.worker(`W${i + 1}`))
        await Promise.all(workers)

        const finishedAt = new Date()
        const report: RunReport = {
            runId,
            startedAt: startedAt.toISOString(),
            finishedAt: finishedAt.toISOString(),
            durationMs: finishedAt.getTime() - startedAt.getTime(),
            ...this.counts,
            reasons: { ...this.reasons },
            tasks: [...this.records]
        }
        if (this.fatal) report.fatal = this.fatal

        log('main', 'PROVISIONER', `Run ${runId} finished: ${report.succeeded} succeeded, ${report.permanentlyFailed} failed, ${report.interrupted} interrupted`, 'log', report.fatal ? 'red' : 'green')
        return report
    }

    private async worker(scope: LogScope): Promise<void> {
        while (!this.stopping && !this.fatal) {
            const identity = await this.deps.feed.next()
            if (!identity) break

            let task = this.newTask(identity, 1)
            for (;;) {
                const outcome = await this.runTask(task, scope)
                if (outcome.next === 'done') break
                task = this.newTask(identity, task.attempt + 1, task.id)
            }
        }
    }

    private newTask(identity: Identity, attempt: number, previous?: string): ProvisioningTask {
        this.taskSeq += 1
        const task: ProvisioningTask = { id: `task-${this.taskSeq}`, identity, attempt, status: 'pending' }
        return previous ? { ...task, previous } : task
    }

    private async runTask(pending: ProvisioningTask, scope: LogScope): Promise<TaskOutcome> {
        const startedAt = Date.now()
        const { identity } = pending

        const proxy = await this.leaseProxy(scope)
        if (!proxy) {
            if (this.fatal) {
                this.finish(pending, startedAt, [], 'failed', 'no-proxy', this.fatal)
            } else {
                this.finish(pending, startedAt, [], 'interrupted')
            }
            return { next: 'done' }
        }

        const task: ProvisioningTask = { ...pending, proxy, status: 'running' }
        log(scope, 'PROVISIONER', `Attempt ${task.attempt}/${this.options.retryBound + 1} for ${identity.email} via ${proxyLabel(proxy)}`)

        let result: SignupResult
        try {
            result = await this.deps.driver.run(identity, proxy, { scope, stopSignal: this.stopController.signal })
        } catch (error) {
            result = {
                state: { step: 'failed', reason: 'unexpected-response', detail: shortErr(error), at: 'started' },
                history: ['started', 'failed']
            }
        }

        const { state, history } = result
        switch (state.step) {
            case 'session-established': {
                await this.deps.pool.release(proxy, true)

                const now = new Date().toISOString()
                const account: AccountRecord = {
                    email: identity.email,
                    password: identity.password,
                    proxy: formatProxy(proxy),
                    session: state.artifact,
                    createdAt: now,
                    updatedAt: now,
                    status: 'active'
                }
                try {
                    await this.deps.store.save(account)
                } catch (error) {
                    // Not retried: the remote account already exists
                    log(scope, 'STORE', `Failed to save ${identity.email}: ${shortErr(error)}`, 'error')
                    this.finish(task, startedAt, history, 'failed', 'store-error', shortErr(error))
                    return { next: 'done' }
                }

                log(scope, 'PROVISIONER', `Account ready: ${identity.email}`, 'log', 'green')
                this.finish(task, startedAt, history, 'succeeded')
                return { next: 'done' }
            }

            case 'failed': {
                await this.deps.pool.release(proxy, false)
                this.reasons[state.reason] = (this.reasons[state.reason] ?? 0) + 1

                if (task.attempt <= this.options.retryBound && !this.stopping && !this.fatal) {
                    this.record(task, startedAt, history, 'retrying', state.reason, state.detail)
                    log(scope, 'PROVISIONER', `Retrying ${identity.email} after ${state.reason}`, 'warn')
                    return { next: 'retry' }
                }

                if (this.stopping) {
                    this.finish(task, startedAt, history, 'interrupted', state.reason, state.detail)
                } else {
                    log(scope, 'PROVISIONER', `Giving up on ${identity.email} after ${task.attempt} attempt(s): ${state.reason}`, 'warn')
                    this.finish(task, startedAt, history, 'failed', state.reason, state.detail)
                }
                return { next: 'done' }
            }

            case 'interrupted':
                await this.deps.pool.release(proxy, true)
                this.finish(task, startedAt, history, 'interrupted')
                return { next: 'done' }
        }
    }

    /** Lease with bounded exponential backoff; null when stopping or when no proxy can ever be leased again */
    private async leaseProxy(scope: LogScope): Promise<AccountProxy | null> {
        let delay = this.options.leaseBaseDelayMs

        for (;;) {
            if (this.deps.pool.usable() === 0) {
                this.markFatal('No usable proxy left: every proxy is quarantined')
                return null
            }
            if (this.stopping) return null

            const proxy = await this.deps.pool.lease()
            if (proxy) return proxy

            log(scope, 'PROXY-POOL', `No free proxy, waiting ${delay}ms`)
            await this.utils.wait(delay, this.stopController.signal)
            delay = Math.min(delay * 2, this.options.leaseMaxDelayMs)
        }
    }

    private markFatal(message: string): void {
        if (this.fatal) return
        this.fatal = message
        log('main', 'PROVISIONER', message, 'error')
        // Wake workers waiting in lease backoff
        this.stopController.abort()
    }

    private finish(task: ProvisioningTask, startedAt: number, history: TaskRecord['history'], status: TaskStatus, reason?: PermanentReason, detail?: string): void {
        if (status === 'succeeded') this.counts.succeeded++
        else if (status === 'interrupted') this.counts.interrupted++
        else {
            this.counts.permanentlyFailed++
            // Driver failures were counted when they happened
            if (reason === 'no-proxy' || reason === 'store-error') this.reasons[reason] = (this.reasons[reason] ?? 0) + 1
        }
        this.record(task, startedAt, history, status, reason, detail)
    }

    private record(task: ProvisioningTask, startedAt: number, history: TaskRecord['history'], status: TaskStatus, reason?: PermanentReason, detail?: string): void {
        const record: TaskRecord = {
            id: task.id,
            email: task.identity.email,
            attempt: task.attempt,
            status,
            history: [...history],
            durationMs: Date.now() - startedAt
        }
        if (task.previous) record.previous = task.previous
        if (task.proxy) record.proxy = proxyLabel(task.proxy)
        if (reason) record.reason = reason
        if (detail) record.detail = detail
        this.records.push(record)
    }
}
