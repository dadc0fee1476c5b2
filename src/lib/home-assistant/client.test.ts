/**
 * HomeAssistantClient tests against an in-process fake server.
 */

import pino from 'pino'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import {
  findClosedPort,
  startFakeHomeAssistant,
  type FakeHomeAssistant,
} from '@/test/helpers/fake-home-assistant'
import { HomeAssistantClient, createHomeAssistantClientFromEnv } from './client'
import { HttpStatusError, NetworkError, ResponseShapeError } from './errors'

const catalog = [
  {
    entity_id: 'sensor.outside_temp',
    state: '21.5',
    attributes: { unit_of_measurement: '°C', friendly_name: 'Outside Temperature' },
  },
  {
    entity_id: 'light.lamp',
    state: 'on',
    attributes: { brightness: 80, friendly_name: 'Lamp' },
  },
  {
    entity_id: 'sensor.door_contact',
    state: 'closed',
    attributes: { friendly_name: 'Door Contact' },
  },
]

describe('HomeAssistantClient', () => {
  let fake: FakeHomeAssistant
  let client: HomeAssistantClient

  beforeEach(async () => {
    fake = await startFakeHomeAssistant()
    fake.route('GET', '/api/states', { status: 200, body: catalog })
    client = new HomeAssistantClient({ ipAddress: '127.0.0.1', portNumber: fake.port, token: 'test-token' })
  })

  afterEach(async () => {
    await fake.close()
  })

  describe('configuration', () => {
    it('should build the base URL from the config', () => {
      expect(client.baseUrl).toBe(`http://127.0.0.1:${fake.port}`)
      expect(client.config.ssl).toBe(false)
      expect(client.config.verify).toBe(true)
    })

    it('should build a client from environment variables', () => {
      const fromEnv = createHomeAssistantClientFromEnv({
        HOME_ASSISTANT_HOST: 'https://ha.example.com',
        HOME_ASSISTANT_TOKEN: 'test-token',
        HOME_ASSISTANT_SSL: 'true',
        HOME_ASSISTANT_VERIFY: 'false',
      })

      expect(fromEnv.baseUrl).toBe('https://ha.example.com')
      expect(fromEnv.config.verify).toBe(false)
    })
  })

  describe('fetchStates', () => {
    it('should send the bearer token', async () => {
      const result = await client.fetchStates()

      expect(result).toEqual({ ok: true, value: catalog })
      expect(fake.requests).toHaveLength(1)
      expect(fake.requests[0]?.method).toBe('GET')
      expect(fake.requests[0]?.path).toBe('/api/states')
      expect(fake.requests[0]?.headers.authorization).toBe('Bearer test-token')
    })

    it('should return a non-array body as an empty catalog', async () => {
      fake.route('GET', '/api/states', { status: 200, body: { message: 'API running.' } })

      expect(await client.fetchStates()).toEqual({ ok: true, value: [] })
    })

    it('should return an HttpStatusError for a non-2xx answer', async () => {
      fake.route('GET', '/api/states', { status: 401, body: { message: 'Unauthorized' } })

      const result = await client.fetchStates()

      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(HttpStatusError)
        expect(result.error).toMatchObject({ status: 401 })
      }
    })
  })

  describe('isConnected', () => {
    it('should be true when the catalog can be fetched', async () => {
      expect(await client.isConnected()).toBe(true)
    })

    it('should be true whatever the payload', async () => {
      fake.route('GET', '/api/states', { status: 200, raw: 'not json' })

      expect(await client.isConnected()).toBe(true)
    })

    it('should be false when the server answers with an error status', async () => {
      fake.route('GET', '/api/states', { status: 500, body: { message: 'boom' } })

      expect(await client.isConnected()).toBe(false)
    })

    it('should be false when the connection is refused', async () => {
      const port = await findClosedPort()
      const offline = new HomeAssistantClient({ ipAddress: '127.0.0.1', portNumber: port, token: 'test-token' })

      expect(await offline.isConnected()).toBe(false)
    })

    it('should be false for an unreachable IPv6 host', async () => {
      const port = await findClosedPort()
      const offline = new HomeAssistantClient({ ipAddress: '::1', portNumber: port, token: 'test-token' })

      expect(offline.baseUrl).toBe(`http://[::1]:${port}`)
      expect(await offline.isConnected()).toBe(false)
    })

    it('should be false when the request times out', async () => {
      fake.route('GET', '/api/states', 'hang')
      const slow = new HomeAssistantClient({
        ipAddress: '127.0.0.1',
        portNumber: fake.port,
        token: 'test-token',
        timeoutMs: 50,
      })

      expect(await slow.isConnected()).toBe(false)
    })
  })

  describe('findEntity', () => {
    it('should resolve a spoken phrase against the live catalog', async () => {
      const match = await client.findEntity('outside temperature sensor', ['sensor'])

      expect(match).toEqual({
        id: 'sensor.outside_temp',
        devName: 'Outside Temperature',
        state: '21.5',
        score: 84,
        attributes: { unit_of_measurement: '°C', friendly_name: 'Outside Temperature' },
      })
    })

    it('should return null when the domain filter excludes every entity', async () => {
      expect(await client.findEntity('outside temperature', new Set(['climate']))).toBeNull()
    })

    it('should fetch the catalog on every call', async () => {
      await client.findEntity('lamp', ['light'])
      await client.findEntity('lamp', ['light'])

      expect(fake.requests.filter(request => request.path === '/api/states')).toHaveLength(2)
    })

    it('should throw HttpStatusError when the catalog request fails', async () => {
      fake.route('GET', '/api/states', { status: 500, body: { message: 'boom' } })

      await expect(client.findEntity('lamp', ['light'])).rejects.toBeInstanceOf(HttpStatusError)
    })

    it('should throw NetworkError when the server is unreachable', async () => {
      const port = await findClosedPort()
      const offline = new HomeAssistantClient({ ipAddress: '127.0.0.1', portNumber: port, token: 'test-token' })

      await expect(offline.findEntity('lamp', ['light'])).rejects.toBeInstanceOf(NetworkError)
    })
  })

  describe('findEntityAttributes', () => {
    it('should report brightness as the unit of a light', async () => {
      expect(await client.findEntityAttributes('light.lamp')).toEqual({
        name: 'Lamp',
        state: 'on',
        unitMeasure: '80',
      })
    })

    it('should report unit_of_measurement for a sensor', async () => {
      expect(await client.findEntityAttributes('sensor.outside_temp')).toEqual({
        name: 'Outside Temperature',
        state: '21.5',
        unitMeasure: '°C',
      })
    })

    it('should report an empty unit when the sensor has none', async () => {
      expect(await client.findEntityAttributes('sensor.door_contact')).toEqual({
        name: 'Door Contact',
        state: 'closed',
        unitMeasure: '',
      })
    })

    it('should return null for an unknown entity id', async () => {
      expect(await client.findEntityAttributes('light.attic')).toBeNull()
    })
  })

  describe('executeService', () => {
    it('should post the payload as JSON and return the response', async () => {
      fake.route('POST', '/api/services/light/turn_on', { status: 200, body: [] })

      const response = await client.executeService('light', 'turn_on', { entity_id: 'light.lamp' })

      expect(response.status).toBe(200)
      const request = fake.requests.at(-1)
      expect(request?.method).toBe('POST')
      expect(request?.path).toBe('/api/services/light/turn_on')
      expect(request?.headers['content-type']).toContain('application/json')
      expect(request?.headers.authorization).toBe('Bearer test-token')
      expect(request?.body).toEqual({ entity_id: 'light.lamp' })
    })

    it('should log the call with its domain, service and entity id', async () => {
      fake.route('POST', '/api/services/light/turn_on', { status: 200, body: [] })
      const lines: string[] = []
      const log = pino({ base: {}, timestamp: false }, { write: (line: string) => lines.push(line) })
      const logged = new HomeAssistantClient(
        { ipAddress: '127.0.0.1', portNumber: fake.port, token: 'test-token' },
        { logger: log },
      )

      await logged.executeService('light', 'turn_on', { entity_id: 'light.lamp' })

      expect(lines.map(line => JSON.parse(line))).toEqual([
        {
          level: 30,
          component: 'home-assistant',
          domain: 'light',
          service: 'turn_on',
          entityId: 'light.lamp',
          msg: 'Calling Home Assistant service',
        },
      ])
    })

    it('should throw HttpStatusError for an unknown service', async () => {
      const call = client.executeService('light', 'explode', { entity_id: 'light.lamp' })

      await expect(call).rejects.toBeInstanceOf(HttpStatusError)
      await expect(call).rejects.toMatchObject({ status: 404 })
    })
  })

  describe('hasComponent', () => {
    beforeEach(() => {
      fake.route('GET', '/api/components', { status: 200, body: ['light', 'sensor', 'conversation'] })
    })

    it('should report loaded components', async () => {
      expect(await client.hasComponent('conversation')).toBe(true)
      expect(await client.hasComponent('climate')).toBe(false)
    })

    it('should reject a component list of the wrong shape', async () => {
      fake.route('GET', '/api/components', { status: 200, body: { components: ['light'] } })

      await expect(client.hasComponent('light')).rejects.toBeInstanceOf(ResponseShapeError)
    })
  })

  describe('engageConversation', () => {
    it('should send the utterance and return the plain speech', async () => {
      fake.route('POST', '/api/conversation/process', {
        status: 200,
        body: { speech: { plain: 'Turned on the lamp' } },
      })

      const reply = await client.engageConversation('turn on the lamp')

      expect(reply).toBe('Turned on the lamp')
      expect(fake.requests.at(-1)?.body).toEqual({ text: 'turn on the lamp' })
    })

    it('should read the nested reply of newer servers', async () => {
      fake.route('POST', '/api/conversation/process', {
        status: 200,
        body: { response: { speech: { plain: { speech: 'The lamp is on', extra_data: null } } } },
      })

      expect(await client.engageConversation('is the lamp on')).toBe('The lamp is on')
    })

    it('should throw ResponseShapeError when the reply has no speech', async () => {
      fake.route('POST', '/api/conversation/process', { status: 200, body: { result: 'ok' } })

      await expect(client.engageConversation('hello')).rejects.toBeInstanceOf(ResponseShapeError)
    })
  })
})
