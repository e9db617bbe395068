import { describe, it, after } from 'node:test';
import assert from 'node:assert';
import { getComponentLogger, logger, setLogLevel } from '../../libs/logging/logger.js';

describe('Logger', () => {
    after(() => {
        setLogLevel('info');
    });

    it('applies a later level to component loggers created before it', () => {
        setLogLevel('info');
        const early = getComponentLogger('early');
        assert.strictEqual(early.isLevelEnabled('debug'), false);

        setLogLevel('debug');

        assert.strictEqual(logger.level, 'debug');
        assert.strictEqual(early.level, 'debug');
        assert.strictEqual(early.isLevelEnabled('debug'), true);
        assert.strictEqual(getComponentLogger('late').level, 'debug');
    });

    it('silences every component logger', () => {
        const component = getComponentLogger('quiet');

        setLogLevel('silent');

        assert.strictEqual(component.isLevelEnabled('fatal'), false);
    });
});
