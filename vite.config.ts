import { defineConfig } from 'vite';
import react from '@vitejs/plugin-react';

// 把自定义元素打包成单个 ES 模块，宿主页面用 <script type="module"> 引入
export default defineConfig({
  plugins: [react()],
  define: {
    'process.env.NODE_ENV': JSON.stringify('production'),
  },
  build: {
    outDir: 'dist/widget',
    lib: {
      entry: 'widget.tsx',
      formats: ['es'],
      fileName: () => 'tryon-widget.js',
    },
  },
});
