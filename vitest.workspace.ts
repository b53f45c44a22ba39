/**
 * Vitest Workspace Configuration
 *
 * Unit tests live beside each package's sources as
 * src/__tests__/*.unit.test.ts.
 *
 * Usage:
 *   npm test                          # Run every project
 *   npm run test:unit                 # Run only unit tests
 */
export default [
  {
    extends: './vitest.shared.ts',
    test: {
      name: 'unit',
      include: [
        'core/src/__tests__/**/*.unit.test.ts',
        'config/src/__tests__/**/*.unit.test.ts',
      ],
      exclude: ['**/node_modules/**', '**/dist/**'],
    },
  },
];
