import request from 'supertest'
import { describe, it, expect, vi } from 'vitest'

vi.mock('pg', () => ({
    Pool: vi.fn(() => ({ on: vi.fn(), query: vi.fn(), connect: vi.fn() })),
}))

import app from '../config/app'

describe('Application Express', () => {
    it('✅ GET / doit renvoyer un message de confirmation', async () => {
        const res = await request(app).get('/')
        expect(res.status).toBe(200)
        expect(res.text).toBe('✅ Backend transport en ligne !')
    })

    it('✅ GET /api/v1 doit répondre correctement', async () => {
        const res = await request(app).get('/api/v1')
        expect(res.status).toBe(200)
        expect(res.text).toBe('✅ Backend transport en ligne en V1 !')
    })

    it('🌐 Test CORS headers', async () => {
        const res = await request(app).get('/')
        expect(res.headers['access-control-allow-origin']).toBe('*')
    })

    it('🪪 Vérifie les en-têtes sécurisés de Helmet', async () => {
        const res = await request(app).get('/')
        expect(res.headers).toHaveProperty('x-dns-prefetch-control')
        expect(res.headers).toHaveProperty('x-frame-options')
        expect(res.headers).toHaveProperty('strict-transport-security')
    })

    it('🔖 Renvoie le X-Request-Id reçu', async () => {
        const res = await request(app).get('/').set('X-Request-Id', 'trace-42')
        expect(res.headers['x-request-id']).toBe('trace-42')
    })

    it('🔖 Génère un X-Request-Id sinon', async () => {
        const res = await request(app).get('/').set('X-Request-Id', 'pas valide !')
        expect(res.headers['x-request-id']).toMatch(/^[0-9a-f-]{36}$/)
    })

    it('🔒 Refuse une route protégée sans token', async () => {
        const res = await request(app).get('/api/v1/expeditions')
        expect(res.status).toBe(401)
        expect(res.body).toEqual({ error: 'UNAUTHORIZED', message: 'Token manquant ou invalide' })
    })

    it('🔒 Refuse un token signé avec un autre secret', async () => {
        const res = await request(app).get('/api/v1/expeditions').set('Authorization', 'Bearer abc.def.ghi')
        expect(res.status).toBe(403)
        expect(res.body.error).toBe('FORBIDDEN')
    })
})
