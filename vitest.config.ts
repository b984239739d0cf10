import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['list/tests/**/*.spec.ts'],
        environment: 'node',
        pool: 'forks',
        poolOptions: {
            forks: {
                // share.spec.ts drives the garbage collector
                execArgv: ['--expose-gc']
            }
        }
    }
});
