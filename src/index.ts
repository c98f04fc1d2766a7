#!/usr/bin/env node
import path from 'path'

import { PlaywrightEngine, PlaywrightSession } from './browser/Browser'
import { ImapMailbox } from './channels/ImapMailbox'
import { createSmsChannel } from './channels/SmsProviders'
import { AccountOpener } from './functions/AccountOpener'
import { OtpResolver } from './functions/OtpResolver'
import { Provisioner } from './functions/Provisioner'
import { SignupDriver } from './functions/SignupDriver'
import { AccountProxy, Identity } from './interface/Account'
import { Config } from './interface/Config'
import { RunReport } from './interface/Provisioning'
import { IdentityFeed } from './pool/IdentityFeed'
import { filterHealthyProxies } from './pool/ProxyCheck'
import { ProxyPool } from './pool/ProxyPool'
import { AccountStore } from './storage/AccountStore'
import { shortErr } from './util/Errors'
import { formatProxy, getConfigPath, loadConfig, loadIdentities, loadProxies, normalizeEmail, ResolvedDurations, resolveDurations } from './util/Load'
import { configureLogger, log } from './util/Logger'
import Util from './util/Utils'
import { saveReport, sendRunSummary } from './util/Webhook'

// Main runner
export class AccountGenerator {
    public config: Config
    public utils: Util = new Util()
    public store: AccountStore

    private durations: ResolvedDurations
    private engine: PlaywrightEngine
    private mailbox?: ImapMailbox
    private provisioner?: Provisioner

    constructor(config: Config = loadConfig()) {
        this.config = config
        configureLogger(config.logging)

        this.durations = resolveDurations(config, this.utils)
        this.store = new AccountStore(path.resolve(process.cwd(), config.sessionPath))
        this.engine = new PlaywrightEngine({
            target: config.target,
            headless: config.headless,
            globalTimeoutMs: this.durations.globalTimeout,
            stateTimeoutMs: this.durations.stateTimeout
        })
    }

    /** Identities and proxies for this run, after skip-used, shuffle, amount and the reachability check */
    async loadSources(): Promise<{ identities: Identity[]; proxies: AccountProxy[] }> {
        const cfg = this.config
        const emailsFile = path.resolve(process.cwd(), cfg.identities.emailsFile)
        const proxiesFile = path.resolve(process.cwd(), cfg.identities.proxiesFile)

        const loadedIdentities = await loadIdentities(emailsFile, cfg.identities.defaultPassword)
        const loadedProxies = await loadProxies(proxiesFile)
        if (loadedIdentities.skipped.length) log('main', 'LOAD', `Skipped ${loadedIdentities.skipped.length} invalid line(s) in ${emailsFile}`, 'warn')
        if (loadedProxies.skipped.length) log('main', 'LOAD', `Skipped ${loadedProxies.skipped.length} invalid line(s) in ${proxiesFile}`, 'warn')

        let identities = loadedIdentities.identities
        let proxies = loadedProxies.proxies

        if (cfg.identities.skipUsed) {
            const accounts = await this.store.all()
            const usedEmails = new Set(accounts.map(a => normalizeEmail(a.email)))
            const usedProxies = new Set(accounts.map(a => a.proxy))

            identities = identities.filter(i => !usedEmails.has(normalizeEmail(i.email)))
            proxies = proxies.filter(p => !usedProxies.has(formatProxy(p)))
            log('main', 'LOAD', `Skipping ${loadedIdentities.identities.length - identities.length} used email(s) and ${loadedProxies.proxies.length - proxies.length} used proxy(ies)`)
        }

        if (cfg.execution.shuffle) {
            identities = this.utils.shuffleArray([...identities])
            proxies = this.utils.shuffleArray([...proxies])
        }
        if (cfg.execution.amount !== undefined) {
            identities = identities.slice(0, cfg.execution.amount)
        }

        if (cfg.proxyPool.check.enabled && proxies.length > 0) {
            proxies = await filterHealthyProxies(proxies, cfg.proxyPool.check, this.durations.proxyCheckTimeout)
        }

        log('main', 'LOAD', `Loaded ${identities.length} identities and ${proxies.length} proxies`)
        return { identities, proxies }
    }

    /** Provision every identity; null when the run could not start */
    async generate(): Promise<RunReport | null> {
        const cfg = this.config
        const { identities, proxies } = await this.loadSources()

        if (identities.length === 0) {
            log('main', 'MAIN', `No identities to provision (${cfg.identities.emailsFile})`, 'error')
            return null
        }
        if (proxies.length === 0) {
            log('main', 'MAIN', `No usable proxies (${cfg.identities.proxiesFile})`, 'error')
            return null
        }

        this.mailbox = cfg.imap.enabled ? new ImapMailbox(cfg.imap) : undefined
        const sms = createSmsChannel(cfg.sms)
        if (!this.mailbox && !sms) {
            log('main', 'MAIN', 'Neither IMAP nor an SMS provider is configured: every signup will time out waiting for a code', 'warn')
        }

        const otp = new OtpResolver({ mailbox: this.mailbox, sms }, {
            deadlineMs: this.durations.otpDeadline,
            mailboxIntervalMs: this.durations.mailboxInterval,
            smsIntervalMs: this.durations.smsInterval
        })

        const provisioner = new Provisioner({
            pool: new ProxyPool(proxies, cfg.proxyPool.failureThreshold),
            feed: new IdentityFeed(identities),
            driver: new SignupDriver(this.engine, otp),
            store: this.store
        }, {
            workers: cfg.execution.workers,
            retryBound: cfg.execution.retryBound,
            leaseBaseDelayMs: this.durations.leaseBaseDelay,
            leaseMaxDelayMs: this.durations.leaseMaxDelay
        })
        this.provisioner = provisioner

        const onSigint = () => {
            if (provisioner.stopping) {
                log('main', 'MAIN', 'Second SIGINT: exiting now', 'warn')
                process.exit(130)
            }
            provisioner.stop()
        }
        process.on('SIGINT', onSigint)

        let report: RunReport
        try {
            report = await provisioner.run()
        } finally {
            process.off('SIGINT', onSigint)
            this.provisioner = undefined
            await this.closeMailbox()
        }

        saveReport(cfg.reports, report)
        await sendRunSummary(cfg.webhook, report)
        return report
    }

    stop(): void {
        this.provisioner?.stop()
    }

    opener(): AccountOpener<PlaywrightSession> {
        return new AccountOpener(this.engine, this.store, this.config.target.homeUrl)
    }

    async list(): Promise<void> {
        const accounts = await this.store.all()
        if (accounts.length === 0) {
            log('main', 'LIST', `No stored accounts in ${this.store.root}`)
            return
        }
        for (const account of accounts) {
            log('main', 'LIST', `${account.email} [${account.status}] created ${account.createdAt}`, 'log', account.status === 'active' ? 'green' : 'red')
        }
    }

    private async closeMailbox(): Promise<void> {
        const mailbox = this.mailbox
        this.mailbox = undefined
        if (!mailbox) return
        await mailbox.close().catch((error: unknown) => {
            log('main', 'MAILBOX', `Failed to close IMAP connection: ${shortErr(error)}`, 'warn')
        })
    }
}

type Command =
    | { kind: 'generate' }
    | { kind: 'open'; email: string }
    | { kind: 'verify' }
    | { kind: 'list' }

export function parseArgs(argv: string[]): Command {
    const openIndex = argv.indexOf('-open')
    if (openIndex >= 0) {
        const email = argv[openIndex + 1]
        if (!email || email.startsWith('-')) throw new Error('Usage: -open <email>')
        return { kind: 'open', email }
    }
    if (argv.includes('-verify')) return { kind: 'verify' }
    if (argv.includes('-list')) return { kind: 'list' }
    return { kind: 'generate' }
}

async function main(argv: string[]): Promise<number> {
    const command = parseArgs(argv)
    const generator = new AccountGenerator()
    log('main', 'MAIN', `Using config ${getConfigPath()}`)

    switch (command.kind) {
        case 'open':
            return (await generator.opener().open(command.email)) ? 0 : 1
        case 'verify':
            await generator.opener().verifyAll()
            return 0
        case 'list':
            await generator.list()
            return 0
        case 'generate': {
            const report = await generator.generate()
            return report && !report.fatal ? 0 : 1
        }
    }
}

if (require.main === module) {
    process.on('unhandledRejection', (reason) => {
        log('main', 'FATAL', 'UnhandledRejection: ' + shortErr(reason), 'error')
        process.exit(1)
    })

    main(process.argv.slice(2))
        .then(code => process.exit(code))
        .catch(error => {
            log('main', 'MAIN-ERROR', `Error running generator: ${shortErr(error)}`, 'error')
            process.exit(1)
        })
}
