import { describe, it, expect } from 'vitest';
import { ConfigError } from '@vmboot/core';
import { loadConfig } from '../config';

describe('loadConfig', () => {
  it('should apply defaults for an empty environment', () => {
    const { config, warnings } = loadConfig({});

    expect(config).toEqual({
      dataDir: './data',
      logLevel: 'info',
      port: 8080,
      listenHost: '0.0.0.0',
      baseURL: 'http://localhost:8080',
      tls: undefined,
      bmc: undefined,
      dwellMs: 300_000,
      shutdownGraceMs: 10_000,
      imageName: 'test-config.iso',
      volumeLabel: 'test-config',
      imageSourceDir: undefined,
    });
    expect(warnings).toEqual([]);
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('should enable TLS and an https base URL when both files are set', () => {
    const { config } = loadConfig({ PORT: '8443', HTTPS_KEY_FILE: '/certs/key.pem', HTTPS_CERT_FILE: '/certs/cert.pem' });

    expect(config.tls).toEqual({ keyFile: '/certs/key.pem', certFile: '/certs/cert.pem' });
    expect(config.baseURL).toBe('https://localhost:8443');
  });

  it('should warn and stay on plain HTTP when only one TLS file is set', () => {
    const { config, warnings } = loadConfig({ HTTPS_CERT_FILE: '/certs/cert.pem' });

    expect(config.tls).toBeUndefined();
    expect(warnings).toEqual(['Only one of HTTPS_KEY_FILE and HTTPS_CERT_FILE is set; serving plain HTTP']);
  });

  it('should prefer an explicit base URL', () => {
    expect(loadConfig({ BASE_URL: 'http://10.0.0.5:8080' }).config.baseURL).toBe('http://10.0.0.5:8080');
  });

  it('should read the management endpoint settings', () => {
    const { config } = loadConfig({
      BMC_ADDRESS: 'https://bmc.test/redfish/v1/Systems/1',
      BMC_USER: 'admin',
      BMC_PASSWORD: 'test-secret',
      BMC_AUTH: 'session',
      BMC_INSECURE: 'true',
      BOOT_DWELL_SECONDS: '0',
      SHUTDOWN_GRACE_SECONDS: '3',
    });

    expect(config.bmc).toEqual({
      address: 'https://bmc.test/redfish/v1/Systems/1',
      user: 'admin',
      password: 'test-secret',
      authMode: 'session',
      insecure: true,
    });
    expect(config.dwellMs).toBe(0);
    expect(config.shutdownGraceMs).toBe(3000);
  });

  it('should treat empty values as unset', () => {
    const { config } = loadConfig({ BMC_ADDRESS: '', PORT: '', IMAGE_SOURCE_DIR: '' });

    expect(config.bmc).toBeUndefined();
    expect(config.port).toBe(8080);
    expect(config.imageSourceDir).toBeUndefined();
  });

  it('should list every invalid field in one ConfigError', () => {
    let caught: unknown;
    try {
      loadConfig({ PORT: 'eighty', BMC_ADDRESS: 'not a url', IMAGE_NAME: '../escape.iso' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (caught instanceof ConfigError) {
      expect(caught.issues.map((issue) => issue.split(':')[0])).toEqual(['PORT', 'BMC_ADDRESS', 'IMAGE_NAME']);
    }
  });

  it('should reject unknown log levels and auth modes', () => {
    expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow(ConfigError);
    expect(() => loadConfig({ BMC_AUTH: 'digest' })).toThrow(ConfigError);
    expect(() => loadConfig({ BMC_INSECURE: 'maybe' })).toThrow(ConfigError);
  });
});
