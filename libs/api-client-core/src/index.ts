export * from './types';
export { BaseClient, type InitializeOptions } from './BaseClient';
export { ClientResponse, reprResponse, type ClientResponseInit, type ResponsePayload } from './ClientResponse';
export * from './errors';
export * from './errorRules';
export * from './retryPolicy';
export * from './authGate';
export * from './responseSchema';
export * from './statusMatch';
export * from './objectPath';
export * from './scheduler';
export * from './logger';
export * from './storage';
export * from './config';
export * from './factories';
export * from './transport/fetchTransport';
export * from './transport/axiosTransport';
