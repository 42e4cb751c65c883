import { defineConfig } from 'vitest/config';

export default defineConfig({
  plugins: [
    {
      // Sources import siblings with .js extensions (NodeNext); map them back to .ts
      name: 'resolve-js-to-ts',
      resolveId(source, importer) {
        if (source.startsWith('.') && source.endsWith('.js') && importer) {
          return this.resolve(source.replace(/\.js$/, '.ts'), importer, { skipSelf: true });
        }
        return null;
      },
    },
  ],
  test: {
    include: ['src/**/*.test.ts'],
    globals: true,
    environment: 'node',
  },
});
