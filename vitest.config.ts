import { defineConfig, transformWithEsbuild } from 'vite';

// Vite's built-in esbuild transform forces `keepNames: false`, which lets
// esbuild rename named function expressions (e.g. `function save` becomes
// `save2`). The tests rely on `fn.name`, so transform TypeScript here with
// `keepNames` enabled instead.
export default defineConfig({
  esbuild: false,
  plugins: [
    {
      name: 'ts-keep-names',
      async transform(code, id) {
        if (!/\.[cm]?tsx?$/.test(id.split('?')[0])) {
          return null;
        }
        const result = await transformWithEsbuild(code, id, {
          target: 'esnext',
          keepNames: true,
        });
        return { code: result.code, map: JSON.stringify(result.map) };
      },
    },
  ],
  test: {
    include: ['test/**/*.test.ts'],
    environment: 'node',
  },
});
