export * from './error'
export * from './params'
export * from './body'
export * from './operation'
export * from './method'
export * from './executor'
export * from './dispatch'
export * from './encode'
export * from './server'

// Re-export commonly used graphql types to ensure single instance
export {
  GraphQLSchema,
  GraphQLObjectType,
  GraphQLNonNull,
  GraphQLString,
  GraphQLError,
} from 'graphql'
export type { DocumentNode, OperationDefinitionNode } from 'graphql'
