// src/interface/Config.ts

export interface Config {
    // Where provisioned accounts (and their sessions) are persisted
    sessionPath: string;

    // Browser
    headless: boolean;
    globalTimeout: number | string;

    // Worker pool & retry policy
    execution: ConfigExecution;

    // Input lists
    identities: ConfigIdentities;

    // Proxy leasing
    proxyPool: ConfigProxyPool;

    // Verification code resolution
    otp: ConfigOtp;
    imap: ConfigImap;
    sms: ConfigSms;

    // Signup target (selectors are site specific)
    target: ConfigTarget;

    // Logging & notifications
    logging: ConfigLogging;
    webhook: ConfigWebhook;
    reports: ConfigReports;
}

/* ---------------------------
   Sub-interfaces & helpers
   --------------------------- */

export interface ConfigExecution {
    workers: number;
    retryBound: number; // retries per identity after the first attempt
    shuffle: boolean; // shuffle identities and proxies before the run
    amount?: number; // cap on identities taken from the list
}

export interface ConfigIdentities {
    emailsFile: string;
    proxiesFile: string;
    defaultPassword: string; // used for lines without an explicit password
    skipUsed: boolean; // drop emails/proxies already present in the account store
}

export interface ConfigProxyPool {
    failureThreshold: number;
    leaseBackoff: ConfigBackoff;
    check: ConfigProxyCheck;
}

export interface ConfigBackoff {
    baseDelay: number | string;
    maxDelay: number | string;
}

export interface ConfigProxyCheck {
    enabled: boolean;
    url: string;
    timeout: number | string;
    concurrency: number;
}

export interface ConfigOtp {
    deadline: number | string;
    mailboxInterval: number | string;
    smsInterval: number | string;
}

export interface ConfigImap {
    enabled: boolean;
    host: string;
    port: number;
    secure: boolean;
    user: string;
    password: string;
    mailbox: string;
}

export type SmsProviderName = 'smspool' | 'herosms' | 'none'

export interface ConfigSms {
    provider: SmsProviderName;
    apiKey: string;
    country: string;
    service: string;
    maxPrice: string;
}

export interface ConfigTarget {
    signupUrl: string;
    homeUrl: string;
    stateTimeout: number | string; // how long to wait for the page to settle into a known state
    typingDelay: number; // per-key delay in ms
    selectors: ConfigTargetSelectors;
}

export interface ConfigTargetSelectors {
    name: string;
    email: string;
    password: string;
    passwordCheck?: string;
    registrationSubmit: string;
    codeInput: string;
    codeSubmit: string;
    error: string;
    authenticated: string;
}

export interface ConfigLogging {
    excludeFunc: string[]; // titles to mute
    redactEmails: boolean;
}

export interface ConfigWebhook {
    enabled: boolean;
    url: string;
    /** Optional: custom username for webhook messages */
    username?: string;
    /** Optional: custom avatar url for webhook messages */
    avatarUrl?: string;
}

export interface ConfigReports {
    enabled: boolean;
    dir: string;
}
