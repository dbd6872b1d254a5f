export * from './client'
export * from './openai-client'
export * from './heuristic-client'
export * from './gateway'
export * from './schemas'
export * from './prompts'
export * from './postprocess'
export * from './assistant'
