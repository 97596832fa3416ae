export * from './fixtures';
export * from './helpers';
export * from './mock-redfish';
