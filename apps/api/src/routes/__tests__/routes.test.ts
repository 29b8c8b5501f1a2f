import request from 'supertest'
import { describe, expect, it, vi } from 'vitest'

vi.mock('../../config/logger', async () => {
  const { createTestLogger } = await import('../../__tests__/fakes')
  const log = createTestLogger()
  return {
    logger: log,
    loggers: { server: log, search: log, catalog: log, ai: log, personalization: log },
  }
})

import { createApp } from '../../app'
import { assembleSearchServices } from '../../services/container'
import { FakeEnhancer, FakeRecommender, catalogByTerm, makePart } from '../../__tests__/fakes'

const a1 = makePart({ partNumber: 'A1', manufacturer: 'Acme', description: '10k resistor', category: 'Resistors' })
const a2 = makePart({ partNumber: 'A2', manufacturer: 'Acme', description: '10k resistor 1%', category: 'Resistors' })
const opAmp = makePart({
  partNumber: 'LM358N',
  manufacturer: 'Texas Instruments',
  description: 'Dual Op Amp',
  category: 'Amplifiers',
})

const FIXED_NOW = new Date('2026-03-01T12:00:00Z')

function buildApp() {
  const catalog = catalogByTerm({
    resistor: [a1, a2],
    Resistors: [a1],
    'Acme Resistors': [a1, a2],
    A1: [a1],
    A2: [a2],
    LM358N: [opAmp],
  })
  const services = assembleSearchServices({
    catalog,
    enhancer: new FakeEnhancer(),
    recommender: new FakeRecommender(),
    aiClient: null,
    now: () => FIXED_NOW,
  })
  return createApp(services)
}

describe('GET /health', () => {
  it('reports status and active users', async () => {
    const response = await request(buildApp()).get('/health')

    expect(response.status).toBe(200)
    expect(response.body.status).toBe('ok')
    expect(response.body.activeUsers).toBe(0)
    expect(typeof response.body.timestamp).toBe('string')
  })
})

describe('POST /api/search', () => {
  it('returns ranked results, templated and personalized recommendations', async () => {
    const response = await request(buildApp())
      .post('/api/search')
      .set('X-User-Id', 'user-42')
      .send({ query: 'resistor' })

    expect(response.status).toBe(200)
    expect(response.body).toEqual({
      originalQuery: 'resistor',
      enhancedQuery: 'resistor',
      results: [
        { partNumber: 'A1', manufacturer: 'Acme', description: '10k resistor', category: 'Resistors', specifications: {} },
        { partNumber: 'A2', manufacturer: 'Acme', description: '10k resistor 1%', category: 'Resistors', specifications: {} },
      ],
      recommendations: [
        'Consider other products from Acme for similar quality',
        'Explore more Resistors for your project needs',
        'Check datasheets for detailed specifications and compatibility',
      ],
      personalizedRecommendations: ['Popular in Resistors: A1 - 10k resistor'],
      totalFound: 2,
      searchContext: '',
    })
  })

  it('feeds the personalized recommendations endpoint', async () => {
    const app = buildApp()
    await request(app).post('/api/search').set('X-User-Id', 'user-42').send({ query: 'resistor', context: 'LED' })

    const response = await request(app).get('/api/recommendations').set('X-User-Id', 'user-42')

    expect(response.status).toBe(200)
    expect(response.body).toEqual({
      userId: 'user-42',
      recommendations: ['Popular in Resistors: A1 - 10k resistor'],
    })
    expect((await request(app).get('/health')).body.activeUsers).toBe(1)
  })

  it('rejects a blank query as INVALID_INPUT', async () => {
    const response = await request(buildApp()).post('/api/search').send({ query: '   ' })

    expect(response.status).toBe(400)
    expect(response.body).toEqual({ error: 'Search query is required', code: 'INVALID_INPUT' })
  })

  it('rejects a missing query with validation details', async () => {
    const response = await request(buildApp()).post('/api/search').send({ context: 'LED' })

    expect(response.status).toBe(400)
    expect(response.body.code).toBe('VALIDATION_FAILED')
    expect(response.body.details.issues[0].path).toBe('query')
  })

  it('rejects an oversized query', async () => {
    const response = await request(buildApp()).post('/api/search').send({ query: 'r'.repeat(501) })

    expect(response.status).toBe(400)
    expect(response.body.code).toBe('VALIDATION_FAILED')
  })

  it('rejects malformed JSON', async () => {
    const response = await request(buildApp())
      .post('/api/search')
      .set('Content-Type', 'application/json')
      .send('{"query":')

    expect(response.status).toBe(400)
    expect(response.body.code).toBe('INVALID_INPUT')
  })

  it('rejects an oversized user id', async () => {
    const response = await request(buildApp())
      .post('/api/search')
      .set('X-User-Id', 'u'.repeat(129))
      .send({ query: 'resistor' })

    expect(response.status).toBe(400)
    expect(response.body.code).toBe('VALIDATION_FAILED')
  })
})

describe('POST /api/search/project', () => {
  it('returns no components without an AI client', async () => {
    const response = await request(buildApp()).post('/api/search/project').send({ description: 'a line follower robot' })

    expect(response.status).toBe(200)
    expect(response.body).toEqual({ description: 'a line follower robot', components: [] })
  })

  it('requires a description', async () => {
    const response = await request(buildApp()).post('/api/search/project').send({ description: ' ' })

    expect(response.status).toBe(400)
    expect(response.body.code).toBe('VALIDATION_FAILED')
  })
})

describe('GET /api/parts/:partNumber', () => {
  it('returns the part', async () => {
    const response = await request(buildApp()).get('/api/parts/LM358N')

    expect(response.status).toBe(200)
    expect(response.body).toEqual({
      partNumber: 'LM358N',
      manufacturer: 'Texas Instruments',
      description: 'Dual Op Amp',
      category: 'Amplifiers',
      specifications: {},
    })
  })

  it('answers 404 for an unknown part', async () => {
    const response = await request(buildApp()).get('/api/parts/NOPE-1')

    expect(response.status).toBe(404)
    expect(response.body).toEqual({ error: 'Part not found', code: 'PART_NOT_FOUND', partNumber: 'NOPE-1' })
  })
})

describe('GET /api/parts/:partNumber/similar', () => {
  it('returns similar parts without the reference', async () => {
    const response = await request(buildApp()).get('/api/parts/A1/similar')

    expect(response.status).toBe(200)
    expect(response.body.partNumber).toBe('A1')
    expect(response.body.parts.map((part: { partNumber: string }) => part.partNumber)).toEqual(['A2'])
  })

  it('validates the limit', async () => {
    const response = await request(buildApp()).get('/api/parts/A1/similar?limit=0')

    expect(response.status).toBe(400)
    expect(response.body.code).toBe('VALIDATION_FAILED')
  })
})

describe('POST /api/parts/compatibility', () => {
  it('returns both parts and the analysis', async () => {
    const response = await request(buildApp())
      .post('/api/parts/compatibility')
      .send({ partNumberA: 'A1', partNumberB: 'LM358N' })

    expect(response.status).toBe(200)
    expect(response.body.partA.partNumber).toBe('A1')
    expect(response.body.partB.partNumber).toBe('LM358N')
    expect(response.body.analysis).toBe('Unable to analyze compatibility at this time.')
  })

  it('answers 404 when a part is unknown', async () => {
    const response = await request(buildApp())
      .post('/api/parts/compatibility')
      .send({ partNumberA: 'A1', partNumberB: 'NOPE-2' })

    expect(response.status).toBe(404)
    expect(response.body).toEqual({ error: 'Part not found', code: 'PART_NOT_FOUND', partNumber: 'NOPE-2' })
  })
})

describe('GET /api/recommendations', () => {
  it('treats a caller without X-User-Id as anonymous', async () => {
    const response = await request(buildApp()).get('/api/recommendations')

    expect(response.status).toBe(200)
    expect(response.body).toEqual({ userId: 'anonymous', recommendations: [] })
  })
})

describe('unknown routes', () => {
  it('answers 404 with a request id header', async () => {
    const response = await request(buildApp()).get('/api/nothing').set('X-Request-ID', 'trace-404')

    expect(response.status).toBe(404)
    expect(response.body).toEqual({ error: 'Not found', code: 'NOT_FOUND' })
    expect(response.headers['x-request-id']).toBe('trace-404')
  })
})
