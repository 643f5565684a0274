/**
 * Tests for services.ts
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import fs from 'node:fs'
import path from 'node:path'
import os from 'node:os'
import {
  Renderer,
  createBatchOptions,
  createServiceInitializer,
  getService,
  loadRuntimeEnv,
  type ServiceContext
} from '../../src/lib/services.js'
import { DEFAULT_RAW_CONFIG, deepMerge, normalizeConfig } from '../../src/lib/config-loader.js'
import { layeredLookup } from '../../src/lib/placeholders.js'
import type { CommandRunner } from '../../src/lib/process.js'
import type { BucketClient, S3Location } from '../../src/lib/s3.js'
import {
  CredentialUnavailableError,
  InvalidCredentialError,
  MissingVariableError,
  UnknownServiceError
} from '../../src/lib/errors.js'

const RAW = deepMerge(DEFAULT_RAW_CONFIG, {
  services: {
    neo4j: {
      marker: 'data/neo4j/.initialized',
      credentials: { var: 'NEO4J_AUTH' },
      probe: { type: 'command', command: 'cypher-shell', args: ['-u', '${principal}', '-p', '${secret}', 'RETURN 1;'] },
      setup: { type: 'command', command: 'cypher-shell', args: ['-u', '${principal}', '--file', '${NEO4J_INIT_FILE}'] },
      retry: { max_attempts: 2 }
    },
    minio: {
      marker: 'data/minio/.initialized',
      probe: { type: 's3', endpoint: '${MINIO_URL}', access_key: '${MINIO_ACCESS_KEY}', secret_key: '${MINIO_SECRET_KEY}' },
      setup: {
        type: 'buckets',
        endpoint: '${MINIO_URL}',
        access_key: '${MINIO_ACCESS_KEY}',
        secret_key: '${MINIO_SECRET_KEY}',
        buckets: ['media', 'backups']
      }
    }
  },
  batches: {
    models: {
      units: 'OLLAMA_MODELS',
      probe: { type: 'http', url: '${OLLAMA_URL}/api/tags' },
      operation: { type: 'ollama', base_url: '${OLLAMA_URL}' }
    },
    'cli-models': {
      units: 'OLLAMA_MODELS',
      operation: { type: 'command', command: 'ollama', args: ['pull', '${unit}'] }
    }
  }
})

describe('services', () => {
  let tempDir: string
  let calls: Array<[string, string[]]>
  let runner: CommandRunner

  const config = () => normalizeConfig(RAW, tempDir)

  const context = (env: Record<string, string>, overrides: Partial<ServiceContext> = {}): ServiceContext => ({
    root: tempDir,
    env,
    sentinel: 'NEED-API-KEY',
    runner,
    ...overrides
  })

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'stackseed-services-test-'))
    calls = []
    runner = async (command, args) => {
      calls.push([command, args])
      return { exitCode: 0, output: '' }
    }
  })

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true })
  })

  describe('Renderer', () => {
    const renderer = new Renderer(
      layeredLookup({ HOST: 'minio', PORT: '9000', KEY: 'NEED-API-KEY' }),
      'service minio',
      'NEED-API-KEY'
    )

    it('should replace references', () => {
      expect(renderer.render('http://${HOST}:${PORT}')).toBe('http://minio:9000')
    })

    it('should fail on unresolved references', () => {
      expect(() => renderer.render('${HOST}:${MISSING}')).toThrow(MissingVariableError)
      expect(() => renderer.render('${MISSING}')).toThrow('Missing variables for service minio: MISSING')
    })

    it('should refuse a value that still holds the sentinel', () => {
      expect(() => renderer.render('Bearer ${KEY}')).toThrow(CredentialUnavailableError)
    })

    it('should resolve extended names first', () => {
      expect(renderer.extend({ HOST: 'localhost' }).render('${HOST}:${PORT}')).toBe('localhost:9000')
    })
  })

  describe('loadRuntimeEnv', () => {
    it('should layer the process environment over the env file', () => {
      const envFile = path.join(tempDir, '.env')
      fs.writeFileSync(envFile, 'NEO4J_AUTH=neo4j/from-file\nOLLAMA_MODELS=llama3.2:1b\n')

      const env = loadRuntimeEnv(envFile, { NEO4J_AUTH: 'neo4j/from-process' })

      expect(env.NEO4J_AUTH).toBe('neo4j/from-process')
      expect(env.OLLAMA_MODELS).toBe('llama3.2:1b')
    })

    it('should use only the process environment when the file is missing', () => {
      expect(loadRuntimeEnv(path.join(tempDir, 'missing.env'), { A: '1' })).toEqual({ A: '1' })
    })
  })

  describe('getService', () => {
    it('should list configured services when the name is unknown', () => {
      expect(() => getService(config(), 'qdrant')).toThrow(UnknownServiceError)

      try {
        getService(config(), 'qdrant')
      } catch (error) {
        expect(error).toBeInstanceOf(UnknownServiceError)
        if (error instanceof UnknownServiceError) {
          expect(error.suggestion).toBe('Configured services: neo4j, minio')
        }
      }
    })
  })

  describe('createServiceInitializer', () => {
    const env = { NEO4J_AUTH: 'neo4j/test-secret/x', NEO4J_INIT_FILE: '/infra/init.cypher' }

    it('should split the credential and run probe and setup with its parts', async () => {
      const initializer = createServiceInitializer(config(), 'neo4j', context(env), { sleep: async () => {} })

      const result = await initializer.run()

      expect(result.outcome).toBe('completed')
      expect(calls).toEqual([
        ['cypher-shell', ['-u', 'neo4j', '-p', 'test-secret/x', 'RETURN 1;']],
        ['cypher-shell', ['-u', 'neo4j', '--file', '/infra/init.cypher']]
      ])
      expect(fs.existsSync(path.join(tempDir, 'data', 'neo4j', '.initialized'))).toBe(true)
    })

    it('should skip without decoding credentials once the marker exists', async () => {
      fs.mkdirSync(path.join(tempDir, 'data', 'neo4j'), { recursive: true })
      fs.writeFileSync(path.join(tempDir, 'data', 'neo4j', '.initialized'), '')

      const result = await createServiceInitializer(config(), 'neo4j', context({})).run()

      expect(result.outcome).toBe('skipped')
      expect(calls).toEqual([])
    })

    it('should fail with an input error on a malformed credential', async () => {
      const result = await createServiceInitializer(config(), 'neo4j', context({ NEO4J_AUTH: 'neo4j' })).run()

      expect(result.exitCode).toBe(2)
      expect(result.error).toBeInstanceOf(InvalidCredentialError)
      expect(result.error?.message).toBe('NEO4J_AUTH must have the form principal/secret')
      expect(calls).toEqual([])
    })

    it('should fail when the credential was never configured', async () => {
      const result = await createServiceInitializer(config(), 'neo4j', context({ NEO4J_AUTH: 'NEED-API-KEY' })).run()

      expect(result.error).toBeInstanceOf(CredentialUnavailableError)
      expect(calls).toEqual([])
    })

    it('should use the service retry override', async () => {
      runner = async () => ({ exitCode: 1, output: 'Connection refused' })

      const result = await createServiceInitializer(config(), 'neo4j', context(env), { sleep: async () => {} }).run()

      expect(result.outcome).toBe('timeout')
      expect(result.attempts).toBe(2)
    })

    it('should probe and create buckets through the bucket client', async () => {
      const locations: S3Location[] = []
      const created: string[] = []
      const client: BucketClient = {
        listBuckets: async () => [],
        createBucket: async (name) => {
          created.push(name)
          return 'created'
        },
        setPublicRead: async () => {}
      }
      const ctx = context(
        { MINIO_URL: 'http://minio:9000', MINIO_ACCESS_KEY: 'test-access', MINIO_SECRET_KEY: 'test-secret' },
        {
          createBucketClient: (location) => {
            locations.push(location)
            return client
          }
        }
      )

      const result = await createServiceInitializer(config(), 'minio', ctx).run()

      expect(result.outcome).toBe('completed')
      expect(created).toEqual(['media', 'backups'])
      expect(locations[0]).toEqual({
        endpoint: 'http://minio:9000',
        accessKey: 'test-access',
        secretKey: 'test-secret',
        region: 'us-east-1'
      })
    })

    it('should report each bucket the setup step handles', async () => {
      const reported: string[] = []
      const client: BucketClient = {
        listBuckets: async () => ['media'],
        createBucket: async (name) => name === 'media' ? 'exists' : 'created',
        setPublicRead: async () => {}
      }
      const ctx = context(
        { MINIO_URL: 'http://minio:9000', MINIO_ACCESS_KEY: 'test-access', MINIO_SECRET_KEY: 'test-secret' },
        {
          createBucketClient: () => client,
          onBucket: (bucket, status) => reported.push(`${bucket} ${status}`)
        }
      )

      const result = await createServiceInitializer(config(), 'minio', ctx).run()

      expect(result.outcome).toBe('completed')
      expect(reported).toEqual(['media exists', 'backups created'])
    })
  })

  describe('createBatchOptions', () => {
    it('should read the unit list from the environment', () => {
      const options = createBatchOptions(config(), 'models', context({
        OLLAMA_MODELS: 'llama3.2:1b, nomic-embed-text,,',
        OLLAMA_URL: 'http://ollama:11434'
      }))

      const plan = options.plan()
      expect(options.units).toEqual(['llama3.2:1b', 'nomic-embed-text'])
      expect(plan.operation.description).toBe('pull via http://ollama:11434')
      expect(plan.probe?.description).toBe('GET http://ollama:11434/api/tags')
    })

    it('should keep the unit placeholder for command operations', async () => {
      const options = createBatchOptions(config(), 'cli-models', context({ OLLAMA_MODELS: 'llama3.2:1b' }))

      const plan = options.plan()
      await plan.operation.run('llama3.2:1b')

      expect(plan.probe).toBeUndefined()
      expect(calls).toEqual([['ollama', ['pull', 'llama3.2:1b']]])
    })

    it('should produce an empty unit list when the variable is unset', () => {
      const options = createBatchOptions(config(), 'cli-models', context({}))

      expect(options.units).toEqual([])
    })

    it('should render probe and operation only when the plan is built', () => {
      const options = createBatchOptions(config(), 'models', context({}))

      expect(options.units).toEqual([])
      expect(() => options.plan()).toThrow(MissingVariableError)
    })

    it('should reject unknown batches', () => {
      expect(() => createBatchOptions(config(), 'embeddings', context({}))).toThrow('Unknown batch: "embeddings"')
    })
  })

  it('should not touch the network for a skipped service', async () => {
    const fetchImpl = vi.fn<typeof fetch>()
    fs.mkdirSync(path.join(tempDir, 'data', 'minio'), { recursive: true })
    fs.writeFileSync(path.join(tempDir, 'data', 'minio', '.initialized'), '')

    const result = await createServiceInitializer(config(), 'minio', context({}, { fetchImpl })).run()

    expect(result.outcome).toBe('skipped')
    expect(fetchImpl).not.toHaveBeenCalled()
  })
})
