import {
    suite,
    test,
} from '@testdeck/mocha';
import {
    defaultEnvOverrides,
    resolveEnv,
} from './env';
import assert = require('assert');

/**
 * Tests for environment layering
 */
@suite('env')
export class EnvTest {
    @test
    'defaultEnvOverrides() keeps the cache inside the working directory'(): void {
        assert.deepStrictEqual(defaultEnvOverrides('/work', {}), { UV_CACHE_DIR: '/work/.uv-cache' });
    }

    @test
    'defaultEnvOverrides() keeps a cache directory set by the caller'(): void {
        assert.deepStrictEqual(defaultEnvOverrides('/work', { UV_CACHE_DIR: '/shared/uv' }), { UV_CACHE_DIR: '/shared/uv' });
    }

    @test
    'resolveEnv() layers base, overrides and step env'(): void {
        const base = { A: 'base', B: 'base', C: 'base' };
        const overrides = { B: 'run', C: 'run' };
        const env = resolveEnv(base, overrides, { C: 'step' });
        assert.deepStrictEqual(env, { A: 'base', B: 'run', C: 'step' });
        assert.deepStrictEqual(base, { A: 'base', B: 'base', C: 'base' });
    }
}
