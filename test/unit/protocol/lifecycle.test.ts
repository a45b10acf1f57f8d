import { describe, it, expect } from 'vitest';
import { InvalidParamsError } from '../../../src/protocol/errors.js';
import {
  DEFAULT_SERVER_DESCRIPTION,
  LATEST_PROTOCOL_VERSION,
  SUPPORTED_PROTOCOL_VERSIONS,
  getDefaultServerCapabilities,
  handleInitialize,
  isSupportedProtocolVersion,
  negotiateProtocolVersion,
} from '../../../src/protocol/lifecycle.js';

describe('Initialization', () => {
  describe('negotiateProtocolVersion', () => {
    it('should echo a supported version', () => {
      for (const version of SUPPORTED_PROTOCOL_VERSIONS) {
        expect(negotiateProtocolVersion(version)).toBe(version);
      }
    });

    it('should offer the latest version otherwise', () => {
      expect(negotiateProtocolVersion('1999-01-01')).toBe(LATEST_PROTOCOL_VERSION);
      expect(LATEST_PROTOCOL_VERSION).toBe('2025-06-18');
    });

    it('should recognise supported versions', () => {
      expect(isSupportedProtocolVersion('2024-11-05')).toBe(true);
      expect(isSupportedProtocolVersion('2024-11-06')).toBe(false);
    });
  });

  describe('handleInitialize', () => {
    it('should describe the server and its tool capability', () => {
      const result = handleInitialize(
        { protocolVersion: '2025-03-26', capabilities: {}, clientInfo: { name: 'weather-cli', version: '0.1.0' } },
        DEFAULT_SERVER_DESCRIPTION
      );

      expect(result).toEqual({
        protocolVersion: '2025-03-26',
        capabilities: { tools: { listChanged: false } },
        serverInfo: { name: 'weather-trace-server', version: '1.0.0' },
        instructions: DEFAULT_SERVER_DESCRIPTION.instructions,
      });
    });

    it('should leave out empty instructions', () => {
      const result = handleInitialize({ protocolVersion: '2025-06-18' }, { name: 'bare', version: '0.0.1' });
      expect(result).not.toHaveProperty('instructions');
      expect(result.serverInfo).toEqual({ name: 'bare', version: '0.0.1' });
    });

    it('should reject missing protocolVersion', () => {
      expect(() => handleInitialize({}, DEFAULT_SERVER_DESCRIPTION)).toThrow(InvalidParamsError);
      expect(() => handleInitialize(undefined, DEFAULT_SERVER_DESCRIPTION)).toThrow('Invalid initialize params');
    });

    it('should reject malformed clientInfo', () => {
      expect(() =>
        handleInitialize({ protocolVersion: '2025-06-18', clientInfo: { name: 1 } }, DEFAULT_SERVER_DESCRIPTION)
      ).toThrow(InvalidParamsError);
    });
  });

  it('should not advertise tool list changes', () => {
    expect(getDefaultServerCapabilities()).toEqual({ tools: { listChanged: false } });
  });
});
