import * as crypto from 'crypto'
import fs from 'fs'
import path from 'path'

import { AccountRecord, AccountStatus, SessionArtifact, StoredCookie, StoredOrigin } from '../interface/Account'
import { errorCode, shortErr } from '../util/Errors'
import { isRecord, normalizeEmail } from '../util/Load'
import { log } from '../util/Logger'
import { Mutex } from '../util/Mutex'

const RECORD_FILE = 'account.json'

/** Directory name for an email: unsafe characters become `_`, plus a hash so distinct emails never collide */
export function accountDirName(email: string): string {
    const key = normalizeEmail(email)
    const safe = key.replace(/[^A-Za-z0-9._@-]/g, '_')
    if (safe === key) return safe

    const hash = crypto.createHash('sha1').update(key).digest('hex').slice(0, 8)
    return `${safe}-${hash}`
}

function parseCookie(value: unknown): StoredCookie | null {
    if (!isRecord(value)) return null
    const { name, value: cookieValue, domain, path: cookiePath, expires, httpOnly, secure, sameSite } = value
    if (typeof name !== 'string' || typeof cookieValue !== 'string' || typeof domain !== 'string') return null

    return {
        name,
        value: cookieValue,
        domain,
        path: typeof cookiePath === 'string' ? cookiePath : '/',
        expires: typeof expires === 'number' ? expires : -1,
        httpOnly: httpOnly === true,
        secure: secure === true,
        sameSite: sameSite === 'Strict' || sameSite === 'None' ? sameSite : 'Lax'
    }
}

function parseOrigin(value: unknown): StoredOrigin | null {
    if (!isRecord(value) || typeof value.origin !== 'string') return null
    const entries = Array.isArray(value.localStorage) ? value.localStorage : []

    return {
        origin: value.origin,
        localStorage: entries.flatMap(entry =>
            isRecord(entry) && typeof entry.name === 'string' && typeof entry.value === 'string'
                ? [{ name: entry.name, value: entry.value }]
                : [])
    }
}

function parseSession(value: unknown): SessionArtifact | null {
    if (!isRecord(value) || !Array.isArray(value.cookies)) return null

    return {
        cookies: value.cookies.flatMap(c => parseCookie(c) ?? []),
        origins: Array.isArray(value.origins) ? value.origins.flatMap(o => parseOrigin(o) ?? []) : [],
        capturedAt: typeof value.capturedAt === 'string' ? value.capturedAt : ''
    }
}

/** Validates a parsed account file; null when it is not an account record */
export function parseAccountRecord(value: unknown): AccountRecord | null {
    if (!isRecord(value)) return null
    const { email, password, proxy, createdAt, updatedAt, status } = value
    if (typeof email !== 'string' || typeof password !== 'string') return null
    if (status !== 'active' && status !== 'failed') return null

    const session = parseSession(value.session)
    if (!session) return null

    return {
        email,
        password,
        proxy: typeof proxy === 'string' ? proxy : '',
        session,
        createdAt: typeof createdAt === 'string' ? createdAt : '',
        updatedAt: typeof updatedAt === 'string' ? updatedAt : '',
        status
    }
}

/**
 * Durable account records, one JSON file per email under `<root>/<email-dir>/account.json`.
 * A save has reached the disk (fsync + rename) before its promise resolves.
 */
export class AccountStore {
    private readonly locks = new Map<string, Mutex>()

    constructor(readonly root: string) { }

    private lock(email: string): Mutex {
        const key = normalizeEmail(email)
        let mutex = this.locks.get(key)
        if (!mutex) {
            mutex = new Mutex()
            this.locks.set(key, mutex)
        }
        return mutex
    }

    private fileFor(email: string): string {
        return path.join(this.root, accountDirName(email), RECORD_FILE)
    }

    /** Upsert by normalized email; the first `createdAt` is kept */
    save(record: AccountRecord): Promise<AccountRecord> {
        return this.lock(record.email).runExclusive(async () => {
            const existing = await this.read(this.fileFor(record.email))
            const stored: AccountRecord = {
                ...record,
                createdAt: existing?.createdAt || record.createdAt,
                updatedAt: new Date().toISOString()
            }
            await this.write(stored)
            return stored
        })
    }

    async find(email: string): Promise<AccountRecord | null> {
        return this.read(this.fileFor(email))
    }

    async all(): Promise<AccountRecord[]> {
        let dirs: fs.Dirent[]
        try {
            dirs = await fs.promises.readdir(this.root, { withFileTypes: true })
        } catch (error) {
            if (isMissing(error)) return []
            throw error
        }

        const records: AccountRecord[] = []
        for (const dir of dirs.filter(d => d.isDirectory()).sort((a, b) => a.name.localeCompare(b.name))) {
            const file = path.join(this.root, dir.name, RECORD_FILE)
            try {
                const record = await this.read(file)
                if (record) records.push(record)
            } catch (error) {
                log('main', 'STORE', `Skipping ${file}: ${shortErr(error)}`, 'warn')
            }
        }
        return records
    }

    markStatus(email: string, status: AccountStatus): Promise<AccountRecord | null> {
        return this.lock(email).runExclusive(async () => {
            const existing = await this.read(this.fileFor(email))
            if (!existing) return null

            const updated: AccountRecord = { ...existing, status, updatedAt: new Date().toISOString() }
            await this.write(updated)
            return updated
        })
    }

    remove(email: string): Promise<boolean> {
        return this.lock(email).runExclusive(async () => {
            const dir = path.dirname(this.fileFor(email))
            if (!fs.existsSync(dir)) return false
            await fs.promises.rm(dir, { recursive: true, force: true })
            return true
        })
    }

    private async read(file: string): Promise<AccountRecord | null> {
        let raw: string
        try {
            raw = await fs.promises.readFile(file, 'utf-8')
        } catch (error) {
            if (isMissing(error)) return null
            throw error
        }

        // A damaged file reads as absent; the next save replaces it
        let record: AccountRecord | null
        try {
            record = parseAccountRecord(JSON.parse(raw))
        } catch (error) {
            log('main', 'STORE', `Ignoring unreadable ${file}: ${shortErr(error)}`, 'warn')
            return null
        }
        if (!record) log('main', 'STORE', `Ignoring ${file}: not a valid account record`, 'warn')
        return record
    }

    private async write(record: AccountRecord): Promise<void> {
        const file = this.fileFor(record.email)
        const dir = path.dirname(file)
        await fs.promises.mkdir(dir, { recursive: true })

        const tmp = path.join(dir, `.${RECORD_FILE}.${process.pid}.${crypto.randomBytes(4).toString('hex')}.tmp`)
        try {
            const handle = await fs.promises.open(tmp, 'w')
            try {
                await handle.writeFile(JSON.stringify(record, null, 2), 'utf-8')
                await handle.sync()
            } finally {
                await handle.close()
            }
            await fs.promises.rename(tmp, file)
        } catch (error) {
            await fs.promises.rm(tmp, { force: true })
            throw error
        }
        await syncDir(dir)
    }
}

/** Persist the rename itself; directories cannot be opened for sync on Windows */
async function syncDir(dir: string): Promise<void> {
    if (process.platform === 'win32') return
    const handle = await fs.promises.open(dir, 'r')
    try {
        await handle.sync()
    } finally {
        await handle.close()
    }
}

function isMissing(error: unknown): boolean {
    return errorCode(error) === 'ENOENT'
}
