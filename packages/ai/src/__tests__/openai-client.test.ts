import OpenAI from 'openai'
import { MissingApiKeyError, OpenAIChatClient } from '../openai-client'

const mockCreate = jest.fn()

jest.mock('openai', () => ({
  __esModule: true,
  default: jest.fn().mockImplementation(() => ({ chat: { completions: { create: mockCreate } } })),
}))

describe('OpenAIChatClient', () => {
  const savedKey = process.env.OPENAI_API_KEY
  const savedModel = process.env.OPENAI_MODEL

  beforeEach(() => {
    delete process.env.OPENAI_API_KEY
    delete process.env.OPENAI_MODEL
    mockCreate.mockReset()
    mockCreate.mockResolvedValue({ choices: [{ message: { content: '{"tasks":[]}' } }] })
  })

  afterAll(() => {
    if (savedKey === undefined) delete process.env.OPENAI_API_KEY
    else process.env.OPENAI_API_KEY = savedKey
    if (savedModel === undefined) delete process.env.OPENAI_MODEL
    else process.env.OPENAI_MODEL = savedModel
  })

  it('refuses to start without an API key', () => {
    expect(() => new OpenAIChatClient()).toThrow(MissingApiKeyError)
  })

  it('reads the key and model from the environment', () => {
    process.env.OPENAI_API_KEY = 'test-secret'
    process.env.OPENAI_MODEL = 'test-model'
    const client = new OpenAIChatClient()
    expect(client.model).toBe('test-model')
    expect(OpenAI).toHaveBeenCalledWith({ apiKey: 'test-secret' })
  })

  it('requests JSON mode at low temperature with the default model', async () => {
    const client = new OpenAIChatClient({ apiKey: 'test-secret' })
    const text = await client.complete([{ role: 'user', content: '{}' }], { responseFormat: 'json_object' })

    expect(text).toBe('{"tasks":[]}')
    expect(mockCreate).toHaveBeenCalledWith({
      model: 'gpt-4o-mini',
      messages: [{ role: 'user', content: '{}' }],
      temperature: 0.2,
      response_format: { type: 'json_object' },
    })
  })

  it('prepends the default system prompt only when none is given', async () => {
    const client = new OpenAIChatClient({ apiKey: 'test-secret', defaultSystemPrompt: 'Be concise.' })

    await client.complete([{ role: 'user', content: 'Hello' }])
    await client.complete([
      { role: 'system', content: 'Answer in JSON.' },
      { role: 'user', content: 'Hello' },
    ])

    expect(mockCreate).toHaveBeenNthCalledWith(1, {
      model: 'gpt-4o-mini',
      messages: [
        { role: 'system', content: 'Be concise.' },
        { role: 'user', content: 'Hello' },
      ],
      temperature: 0.2,
    })
    expect(mockCreate).toHaveBeenNthCalledWith(2, {
      model: 'gpt-4o-mini',
      messages: [
        { role: 'system', content: 'Answer in JSON.' },
        { role: 'user', content: 'Hello' },
      ],
      temperature: 0.2,
    })
  })

  it('returns an empty string when the model sends no content', async () => {
    mockCreate.mockResolvedValue({ choices: [] })
    const client = new OpenAIChatClient({ apiKey: 'test-secret' })
    await expect(client.complete([{ role: 'user', content: 'Hello' }])).resolves.toBe('')
  })
})
