import { describe, expect, it } from 'vitest'

import { AccountOpener } from '../src/functions/AccountOpener'
import { BrowserEngine } from '../src/interface/BrowserEngine'
import { ProxyError } from '../src/util/Errors'
import { FakeEngine, FakeSession, makeArtifact, makeProxy, makeRecord, MemoryStore } from './fakes'

const HOME = 'https://www.example.com/'

async function storeWith(...records: ReturnType<typeof makeRecord>[]): Promise<MemoryStore> {
    const store = new MemoryStore()
    for (const record of records) await store.save(record)
    return store
}

describe('AccountOpener.verify', () => {
    it('reports a stored session that is still signed in', async () => {
        const engine = new FakeEngine()
        const store = await storeWith(makeRecord(1))

        expect(await new AccountOpener(engine, store, HOME).verify('user1@example.com')).toBe('active')

        const session = engine.sessions[0]
        expect(session?.restoredFrom).toEqual(makeArtifact())
        expect(session?.proxy).toEqual(makeProxy(1))
        expect(session?.url).toBe(HOME)
        expect(session?.closed).toBe(true)
        expect((await store.find('user1@example.com'))?.status).toBe('active')
    })

    it('marks the account failed when the session is signed out', async () => {
        const engine = new FakeEngine(() => ({ afterVerification: { kind: 'verification-required' } }))
        const store = await storeWith(makeRecord(1))

        expect(await new AccountOpener(engine, store, HOME).verify('user1@example.com')).toBe('failed')
        expect((await store.find('user1@example.com'))?.status).toBe('failed')
        expect(engine.sessions[0]?.closed).toBe(true)
    })

    it('marks the account failed when its stored proxy cannot be parsed', async () => {
        const engine = new FakeEngine()
        const store = await storeWith(makeRecord(1, { proxy: 'not-a-proxy' }))

        expect(await new AccountOpener(engine, store, HOME).verify('user1@example.com')).toBe('failed')
        expect(engine.sessions).toHaveLength(0)
        expect((await store.find('user1@example.com'))?.status).toBe('failed')
    })

    it('keeps the stored status when the proxy cannot be reached', async () => {
        const engine = new FakeEngine(() => ({ openError: new ProxyError('Proxy 10.0.0.1:8001 failed: ERR_PROXY_CONNECTION_FAILED') }))
        const store = await storeWith(makeRecord(1))

        expect(await new AccountOpener(engine, store, HOME).verify('user1@example.com')).toBe('unreachable')
        expect((await store.find('user1@example.com'))?.status).toBe('active')
    })

    it('keeps the stored status when the browser fails for another reason', async () => {
        const engine = new FakeEngine(() => ({ openError: new Error('browserType.launch: Executable not found') }))
        const store = await storeWith(makeRecord(1))

        expect(await new AccountOpener(engine, store, HOME).verify('user1@example.com')).toBe('unreachable')
        expect((await store.find('user1@example.com'))?.status).toBe('active')
    })

    it('reports unknown accounts as missing', async () => {
        expect(await new AccountOpener(new FakeEngine(), new MemoryStore(), HOME).verify('nobody@example.com')).toBe('missing')
    })
})

describe('AccountOpener.verifyAll', () => {
    it('checks every active account once', async () => {
        const engine = new FakeEngine(proxy => proxy.port === 8003 ? { openError: new Error('page.goto: net::ERR_PROXY_CONNECTION_FAILED') } : {})
        const store = await storeWith(makeRecord(1), makeRecord(2, { status: 'failed' }), makeRecord(3))

        const results = await new AccountOpener(engine, store, HOME).verifyAll()

        expect(results).toEqual({ 'user1@example.com': 'active', 'user3@example.com': 'unreachable' })
        expect(engine.sessions).toHaveLength(1)
        expect((await store.find('user3@example.com'))?.status).toBe('active')
    })
})

describe('AccountOpener.open', () => {
    it('stores the session captured when the window closes', async () => {
        const engine = new FakeEngine()
        const store = await storeWith(makeRecord(1))

        expect(await new AccountOpener(engine, store, HOME).open('user1@example.com')).toBe(true)

        expect((await store.find('user1@example.com'))?.session).toEqual(makeArtifact('captured-1'))
        expect(engine.sessions[0]?.closed).toBe(true)
    })

    it('returns false for an unknown account', async () => {
        expect(await new AccountOpener(new FakeEngine(), new MemoryStore(), HOME).open('nobody@example.com')).toBe(false)
    })

    it('refuses an engine that cannot wait for the window to close', async () => {
        const fake = new FakeEngine()
        const headlessOnly: BrowserEngine<FakeSession> = {
            open: proxy => fake.open(proxy),
            submit: (session, form, fields) => fake.submit(session, form, fields),
            read: session => fake.read(session),
            capture: () => fake.capture(),
            close: session => fake.close(session),
            restore: (artifact, proxy, url) => fake.restore(artifact, proxy, url)
        }
        const store = await storeWith(makeRecord(1))

        await expect(new AccountOpener(headlessOnly, store, HOME).open('user1@example.com'))
            .rejects.toThrow('This browser engine cannot be opened interactively')
        expect(fake.sessions).toHaveLength(0)
    })
})
