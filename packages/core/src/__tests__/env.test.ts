import { describe, expect, it } from 'vitest'
import { z } from 'zod'
import { baseEnvSchema, createEnvSchema } from '../env'

describe('Environment schema', () => {
  it('should apply defaults for missing variables', () => {
    expect(baseEnvSchema.parse({})).toEqual({
      NODE_ENV: 'development',
      LOG_LEVEL: 'info',
    })
  })

  it('should reject an unknown log level', () => {
    expect(() => baseEnvSchema.parse({ LOG_LEVEL: 'verbose' })).toThrow()
  })

  it('should extend the base schema', () => {
    const schema = createEnvSchema({
      WORDVM_TEST_FLAG: z.enum(['on', 'off']).default('off'),
    })

    expect(schema.parse({ WORDVM_TEST_FLAG: 'on', LOG_LEVEL: 'debug' })).toEqual({
      NODE_ENV: 'development',
      LOG_LEVEL: 'debug',
      WORDVM_TEST_FLAG: 'on',
    })
  })
})
