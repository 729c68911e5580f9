import express from 'express'
import request from 'supertest'
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest'

import { errorHandler } from '../middlewares/errorHandler'
import { HttpError } from '../utils/httpError'

function appThrowing(err: unknown) {
    const app = express()
    app.get('/boom', (_req, _res, next) => next(err))
    app.use(errorHandler)
    return app
}

function pgError(code: string, constraint?: string) {
    return Object.assign(new Error(`pg ${code}`), { code, ...(constraint ? { constraint } : {}) })
}

beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined)
    vi.spyOn(console, 'error').mockImplementation(() => undefined)
})

afterEach(() => {
    vi.restoreAllMocks()
})

describe('errorHandler', () => {
    it('renvoie le statut et le code d’une HttpError', async () => {
        const res = await request(appThrowing(new HttpError(503, 'NUMERO_SEQUENCE_EXHAUSTED', 'plus de numéro'))).get('/boom')

        expect(res.status).toBe(503)
        expect(res.body).toEqual({ error: 'NUMERO_SEQUENCE_EXHAUSTED', message: 'plus de numéro' })
    })

    it('traduit un dépassement numérique en 400', async () => {
        const res = await request(appThrowing(pgError('22003'))).get('/boom')

        expect(res.status).toBe(400)
        expect(res.body).toEqual({ error: 'NUMERIC_OUT_OF_RANGE', message: 'Valeur numérique hors limites.' })
    })

    it('traduit une contrainte unique en 409 avec son nom', async () => {
        const res = await request(appThrowing(pgError('23505', 'clients_email_key'))).get('/boom')

        expect(res.status).toBe(409)
        expect(res.body).toEqual({
            error: 'UNIQUE_VIOLATION',
            message: 'Cette valeur existe déjà.',
            details: { constraint: 'clients_email_key' },
        })
    })

    it('traduit une clé étrangère en 409', async () => {
        const res = await request(appThrowing(pgError('23503', 'vehicule_chauffeur_id_fkey'))).get('/boom')

        expect(res.status).toBe(409)
        expect(res.body.error).toBe('FOREIGN_KEY_VIOLATION')
    })

    it('garde 500 pour une erreur inconnue', async () => {
        const res = await request(appThrowing(pgError('40P01'))).get('/boom')

        expect(res.status).toBe(500)
        expect(res.body).toEqual({ error: 'INTERNAL_ERROR', message: 'Internal Server Error' })
        expect(console.error).toHaveBeenCalledWith('[ERROR]', 'Error caught by middleware:', expect.objectContaining({ message: 'pg 40P01' }))
    })
})
