export * from './document';
export { ConfigurableLoggerFactory } from './logging/ConfigurableLoggerFactory';
