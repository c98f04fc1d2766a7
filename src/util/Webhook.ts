import fs from 'fs'
import path from 'path'

import { ConfigReports, ConfigWebhook } from '../interface/Config'
import { RunReport } from '../interface/Provisioning'
import AxiosClient, { HttpRequester } from './Axios'
import { shortErr } from './Errors'
import { log } from './Logger'

const DISCORD = {
    COLOR_GREEN: 0x2ecc71,
    COLOR_ORANGE: 0xe67e22,
    COLOR_RED: 0xe74c3c
}

function formatDuration(ms: number): string {
    const seconds = Math.round(ms / 1000)
    const h = Math.floor(seconds / 3600)
    const m = Math.floor((seconds % 3600) / 60)
    const s = seconds % 60
    return h > 0 ? `${h}h ${m}m ${s}s` : m > 0 ? `${m}m ${s}s` : `${s}s`
}

function embedColor(report: RunReport): number {
    if (report.fatal) return DISCORD.COLOR_RED
    return report.permanentlyFailed > 0 || report.interrupted > 0 ? DISCORD.COLOR_ORANGE : DISCORD.COLOR_GREEN
}

/** Discord-compatible webhook body summarizing one run */
export function buildSummaryPayload(report: RunReport, webhook: Pick<ConfigWebhook, 'username' | 'avatarUrl'>) {
    const reasons = Object.entries(report.reasons)
        .map(([reason, count]) => `\`${reason}\`: ${count}`)
        .join('\n')

    const fields = [
        { name: 'Succeeded', value: String(report.succeeded), inline: true },
        { name: 'Failed', value: String(report.permanentlyFailed), inline: true },
        { name: 'Interrupted', value: String(report.interrupted), inline: true },
        { name: 'Duration', value: formatDuration(report.durationMs), inline: true },
        { name: 'Failure reasons', value: reasons || 'none', inline: false }
    ]
    if (report.fatal) fields.push({ name: 'Fatal', value: report.fatal, inline: false })

    return {
        ...(webhook.username ? { username: webhook.username } : {}),
        ...(webhook.avatarUrl ? { avatar_url: webhook.avatarUrl } : {}),
        embeds: [{
            title: `Provisioning run ${report.runId}`,
            color: embedColor(report),
            fields,
            timestamp: report.finishedAt
        }]
    }
}

export async function sendRunSummary(webhook: ConfigWebhook, report: RunReport, http: HttpRequester = new AxiosClient()): Promise<boolean> {
    if (!webhook.enabled || !webhook.url) return false

    try {
        await http.request({
            method: 'POST',
            url: webhook.url,
            headers: { 'Content-Type': 'application/json' },
            data: buildSummaryPayload(report, webhook),
            timeout: 10000
        }, true)
        log('main', 'WEBHOOK', 'Run summary sent')
        return true
    } catch (error) {
        log('main', 'WEBHOOK', `Failed to send run summary: ${shortErr(error)}`, 'warn')
        return false
    }
}

/** Writes `<dir>/<YYYY-MM-DD>/summary_<runId>.json`; returns the file path, or null when disabled or failed */
export function saveReport(reports: ConfigReports, report: RunReport, now: Date = new Date()): string | null {
    if (!reports.enabled) return null

    try {
        const day = `${now.getFullYear()}-${String(now.getMonth() + 1).padStart(2, '0')}-${String(now.getDate()).padStart(2, '0')}`
        const baseDir = path.resolve(process.cwd(), reports.dir, day)
        if (!fs.existsSync(baseDir)) fs.mkdirSync(baseDir, { recursive: true })

        const file = path.join(baseDir, `summary_${report.runId}.json`)
        fs.writeFileSync(file, JSON.stringify(report, null, 2), 'utf-8')
        log('main', 'REPORT', `Saved report to ${file}`)
        return file
    } catch (error) {
        log('main', 'REPORT', `Failed to save report: ${shortErr(error)}`, 'warn')
        return null
    }
}
