import { defineConfig } from 'tsup'

/**
 * Build configuration for the rlbridge library
 *
 * - Single public entry; modules are reached through its namespaces
 * - zod stays external (declared dependency)
 */
export default defineConfig({
    name: 'rlbridge',

    entry: {
        index: 'index.ts',
    },

    format: ['cjs', 'esm'],
    dts: true,

    splitting: true,
    minify: false,
    treeshake: true,

    sourcemap: false,
    clean: true,

    external: ['zod'],

    outDir: 'dist',
    target: 'es2022',
    platform: 'node',
})
