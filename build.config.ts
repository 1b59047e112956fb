import { defineBuildConfig } from 'unbuild';

export default defineBuildConfig({
  entries: [
    'src/index',
    'src/adapters/sqljs',
    'src/adapters/better-sqlite',
  ],
  declaration: true,
  clean: true,
  rollup: {
    emitCJS: false,
  },
});
