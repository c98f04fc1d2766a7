import { Identity } from '../interface/Account'
import { ChannelPoll, SmsAcquire, SmsChannel } from '../interface/Channels'
import { ConfigSms } from '../interface/Config'
import AxiosClient, { HttpRequester } from '../util/Axios'
import { shortErr } from '../util/Errors'
import { isRecord } from '../util/Load'
import { log } from '../util/Logger'
import { extractSmsCode } from './extractCode'

const REQUEST_TIMEOUT_MS = 20000

function field(data: unknown, key: string): unknown {
    return isRecord(data) ? data[key] : undefined
}

function asText(value: unknown): string {
    return typeof value === 'string' || typeof value === 'number' ? String(value) : ''
}

/** SMSPool (api.smspool.net): numbers are bought per order, codes polled per order id */
export class SmsPoolProvider implements SmsChannel {
    static readonly BASE_URL = 'https://api.smspool.net'

    constructor(private readonly cfg: ConfigSms, private readonly http: HttpRequester = new AxiosClient()) { }

    private form(fields: Record<string, string>): FormData {
        const form = new FormData()
        for (const [key, value] of Object.entries(fields)) form.append(key, value)
        return form
    }

    async acquire(identity: Identity, signal: AbortSignal): Promise<SmsAcquire> {
        try {
            const response = await this.http.request({
                url: `${SmsPoolProvider.BASE_URL}/purchase/sms`,
                method: 'POST',
                headers: { Authorization: `Bearer ${this.cfg.apiKey}` },
                data: this.form({
                    key: this.cfg.apiKey,
                    country: this.cfg.country,
                    service: this.cfg.service,
                    pool: '',
                    max_price: this.cfg.maxPrice,
                    pricing_option: '',
                    quantity: '1',
                    areacode: '',
                    exclude: '',
                    create_token: ''
                }),
                timeout: REQUEST_TIMEOUT_MS,
                signal
            }, true)

            const phoneNumber = asText(field(response.data, 'phonenumber'))
            const orderId = asText(field(response.data, 'order_id'))
            if (!phoneNumber || !orderId) {
                const message = asText(field(response.data, 'message')) || 'unexpected purchase payload'
                return { status: 'failed', reason: `SMSPool purchase failed: ${message}` }
            }

            log('main', 'SMS', `Rented ${phoneNumber} (order ${orderId}) for ${identity.email}`)
            return { status: 'acquired', request: { requestId: orderId, phoneNumber } }
        } catch (error) {
            return { status: 'failed', reason: `SMSPool purchase failed: ${shortErr(error)}` }
        }
    }

    async poll(requestId: string, signal: AbortSignal): Promise<ChannelPoll> {
        try {
            const response = await this.http.request({
                url: `${SmsPoolProvider.BASE_URL}/sms/check`,
                method: 'POST',
                headers: { Authorization: `Bearer ${this.cfg.apiKey}` },
                data: this.form({ orderid: requestId, key: this.cfg.apiKey }),
                timeout: REQUEST_TIMEOUT_MS,
                signal
            }, true)

            const sms = asText(field(response.data, 'sms'))
            if (sms) {
                const code = extractSmsCode(sms)
                return code ? { status: 'code', code } : { status: 'none' }
            }

            // 6 = refunded: the order will never receive a message
            if (asText(field(response.data, 'status')) === '6') {
                return { status: 'failed', reason: `SMSPool order ${requestId} refunded` }
            }
            return { status: 'none' }
        } catch (error) {
            return { status: 'failed', reason: `SMSPool check failed: ${shortErr(error)}` }
        }
    }
}

/** HeroSMS (sms-activate compatible handler API) */
export class HeroSmsProvider implements SmsChannel {
    static readonly BASE_URL = 'https://hero-sms.com/stubs/handler_api.php'

    constructor(private readonly cfg: ConfigSms, private readonly http: HttpRequester = new AxiosClient()) { }

    async acquire(identity: Identity, signal: AbortSignal): Promise<SmsAcquire> {
        try {
            const response = await this.http.request({
                url: HeroSmsProvider.BASE_URL,
                method: 'GET',
                params: {
                    action: 'getNumberV2',
                    service: this.cfg.service,
                    country: this.cfg.country,
                    maxPrice: this.cfg.maxPrice,
                    api_key: this.cfg.apiKey
                },
                timeout: REQUEST_TIMEOUT_MS,
                signal
            }, true)

            if (typeof response.data === 'string') {
                return { status: 'failed', reason: `HeroSMS: ${response.data.trim() || 'empty response'}` }
            }

            const phoneNumber = asText(field(response.data, 'phoneNumber'))
            const activationId = asText(field(response.data, 'activationId'))
            if (!phoneNumber || !activationId) {
                return { status: 'failed', reason: 'HeroSMS: unexpected getNumberV2 payload' }
            }

            log('main', 'SMS', `Rented ${phoneNumber} (activation ${activationId}) for ${identity.email}`)
            return { status: 'acquired', request: { requestId: activationId, phoneNumber } }
        } catch (error) {
            return { status: 'failed', reason: `HeroSMS getNumberV2 failed: ${shortErr(error)}` }
        }
    }

    async poll(requestId: string, signal: AbortSignal): Promise<ChannelPoll> {
        try {
            const response = await this.http.request({
                url: HeroSmsProvider.BASE_URL,
                method: 'GET',
                params: { action: 'getStatusV2', id: requestId, api_key: this.cfg.apiKey },
                timeout: REQUEST_TIMEOUT_MS,
                signal
            }, true)

            if (typeof response.data === 'string') {
                return /CANCEL|NO_ACTIVATION|BAD_KEY/i.test(response.data)
                    ? { status: 'failed', reason: `HeroSMS: ${response.data.trim()}` }
                    : { status: 'none' }
            }

            const code = asText(field(field(response.data, 'sms'), 'code'))
            if (!code) return { status: 'none' }

            const extracted = extractSmsCode(code)
            return extracted ? { status: 'code', code: extracted } : { status: 'none' }
        } catch (error) {
            return { status: 'failed', reason: `HeroSMS getStatusV2 failed: ${shortErr(error)}` }
        }
    }
}

export function createSmsChannel(cfg: ConfigSms, http?: HttpRequester): SmsChannel | undefined {
    if (!cfg.apiKey) return undefined

    switch (cfg.provider) {
        case 'smspool':
            return new SmsPoolProvider(cfg, http)
        case 'herosms':
            return new HeroSmsProvider(cfg, http)
        default:
            return undefined
    }
}
