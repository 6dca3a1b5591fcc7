import { defineConfig } from 'vite'

// Library build: the rules engine ships as a single ES module.
export default defineConfig({
  build: {
    outDir: 'dist',
    lib: {
      entry: 'src/index.ts',
      formats: ['es'],
      fileName: 'bitboard-tictactoe',
    },
    sourcemap: true,
  },
})
