import { describe, it, expect } from 'vitest';
import { parseEnv } from '../env.js';
import { ConfigValidationError } from '../../common/errors.js';

describe('parseEnv', () => {
  it('should apply defaults to an empty environment', () => {
    const env = parseEnv({});

    expect(env.PORT).toBe(8001);
    expect(env.ADVISOR_CRON).toBe('0 */6 * * *');
    expect(env.ADVISOR_CRON_ENABLED).toBe(false);
    expect(env.ADVISOR_ALERTS_ENABLED).toBe(false);
    expect(env.MONGO_URL).toBeUndefined();
  });

  it('should coerce the port and read boolean flags', () => {
    const env = parseEnv({ PORT: '9000', ADVISOR_ALERTS_ENABLED: '1', ADVISOR_CRON_ENABLED: 'true' });

    expect(env.PORT).toBe(9000);
    expect(env.ADVISOR_ALERTS_ENABLED).toBe(true);
    expect(env.ADVISOR_CRON_ENABLED).toBe(true);
  });

  it('should reject a non-numeric port', () => {
    expect(() => parseEnv({ PORT: 'abc' })).toThrow(ConfigValidationError);
  });
});
