import fs from 'fs'
import os from 'os'
import path from 'path'
import { AxiosRequestConfig } from 'axios'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'

import { RunReport } from '../src/interface/Provisioning'
import { HttpRequester } from '../src/util/Axios'
import { buildSummaryPayload, saveReport, sendRunSummary } from '../src/util/Webhook'

function makeReport(overrides: Partial<RunReport> = {}): RunReport {
    return {
        runId: 'abcd1234',
        startedAt: '2026-01-05T10:00:00.000Z',
        finishedAt: '2026-01-05T11:02:03.000Z',
        durationMs: 3723000,
        succeeded: 2,
        permanentlyFailed: 1,
        interrupted: 0,
        reasons: { 'proxy-error': 2, 'otp-timeout': 1 },
        tasks: [],
        ...overrides
    }
}

function recorder(fail?: Error) {
    const calls: Array<{ config: AxiosRequestConfig; bypass?: boolean }> = []
    const http: HttpRequester = {
        async request(config, bypass) {
            calls.push({ config, bypass })
            if (fail) throw fail
            return { status: 204, data: '' }
        }
    }
    return { http, calls }
}

describe('buildSummaryPayload', () => {
    it('summarizes counts, duration and failure reasons', () => {
        const payload = buildSummaryPayload(makeReport(), { username: 'Provisioner' })

        expect(payload).toEqual({
            username: 'Provisioner',
            embeds: [{
                title: 'Provisioning run abcd1234',
                color: 0xe67e22,
                fields: [
                    { name: 'Succeeded', value: '2', inline: true },
                    { name: 'Failed', value: '1', inline: true },
                    { name: 'Interrupted', value: '0', inline: true },
                    { name: 'Duration', value: '1h 2m 3s', inline: true },
                    { name: 'Failure reasons', value: '`proxy-error`: 2\n`otp-timeout`: 1', inline: false }
                ],
                timestamp: '2026-01-05T11:02:03.000Z'
            }]
        })
    })

    it('flags a fatal run in red', () => {
        const payload = buildSummaryPayload(makeReport({ fatal: 'No usable proxy left', durationMs: 65000, reasons: {} }), {})
        const embed = payload.embeds[0]

        expect(embed?.color).toBe(0xe74c3c)
        expect(embed?.fields.find(f => f.name === 'Duration')?.value).toBe('1m 5s')
        expect(embed?.fields.find(f => f.name === 'Failure reasons')?.value).toBe('none')
        expect(embed?.fields.at(-1)).toEqual({ name: 'Fatal', value: 'No usable proxy left', inline: false })
        expect(payload).not.toHaveProperty('username')
    })

    it('uses green for a clean run', () => {
        const payload = buildSummaryPayload(makeReport({ permanentlyFailed: 0, reasons: {} }), {})

        expect(payload.embeds[0]?.color).toBe(0x2ecc71)
    })
})

describe('sendRunSummary', () => {
    it('does nothing when disabled', async () => {
        const { http, calls } = recorder()

        expect(await sendRunSummary({ enabled: false, url: 'https://hooks.example.com/run' }, makeReport(), http)).toBe(false)
        expect(await sendRunSummary({ enabled: true, url: '' }, makeReport(), http)).toBe(false)
        expect(calls).toHaveLength(0)
    })

    it('posts the payload directly, without a proxy', async () => {
        const { http, calls } = recorder()
        const webhook = { enabled: true, url: 'https://hooks.example.com/run', avatarUrl: 'https://example.com/a.png' }

        expect(await sendRunSummary(webhook, makeReport(), http)).toBe(true)
        expect(calls).toHaveLength(1)
        expect(calls[0]?.bypass).toBe(true)
        expect(calls[0]?.config.method).toBe('POST')
        expect(calls[0]?.config.url).toBe('https://hooks.example.com/run')
        expect(calls[0]?.config.data).toEqual(buildSummaryPayload(makeReport(), webhook))
    })

    it('reports a failed delivery without throwing', async () => {
        const { http } = recorder(new Error('Request failed with status code 404'))

        expect(await sendRunSummary({ enabled: true, url: 'https://hooks.example.com/run' }, makeReport(), http)).toBe(false)
    })
})

describe('saveReport', () => {
    let dir: string

    beforeEach(async () => {
        dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'reports-'))
    })

    afterEach(async () => {
        await fs.promises.rm(dir, { recursive: true, force: true })
    })

    it('writes the report under a dated folder', () => {
        const report = makeReport()

        const file = saveReport({ enabled: true, dir }, report, new Date(2026, 0, 5, 12))

        expect(file).toBe(path.join(dir, '2026-01-05', 'summary_abcd1234.json'))
        expect(JSON.parse(fs.readFileSync(path.join(dir, '2026-01-05', 'summary_abcd1234.json'), 'utf-8'))).toEqual(report)
    })

    it('skips writing when disabled', () => {
        expect(saveReport({ enabled: false, dir }, makeReport())).toBeNull()
        expect(fs.readdirSync(dir)).toEqual([])
    })
})
