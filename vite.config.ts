/// <reference types="vitest" />
import { defineConfig } from 'vite';
import { fileURLToPath } from 'node:url';
import dts from 'vite-plugin-dts';

const entry = fileURLToPath(new URL('./src/index.ts', import.meta.url));

export default defineConfig({
  // 빌드 설정
  build: {
    // 라이브러리 모드로 빌드
    lib: {
      // 진입점 파일
      entry,
      // 출력 형식: ES Module + CommonJS
      formats: ['es', 'cjs'],
      // 출력 파일명 패턴
      fileName: (format) => `index.${format === 'es' ? 'js' : 'cjs'}`,
    },
    rollupOptions: {
      // 번들에 포함하지 않을 외부 패키지 (Node 내장 모듈 포함)
      external: ['arquero', 'js-yaml', 'zod', /^node:/],
    },
    // Node.js 대상
    target: 'node20',
    // 소스맵 생성 (디버깅용)
    sourcemap: true,
    // 출력 폴더 비우기
    emptyOutDir: true,
  },

  // 플러그인
  plugins: [
    // TypeScript 타입 정의 파일(.d.ts) 자동 생성
    dts({
      include: ['src/**/*'],
      rollupTypes: false,
    }),
  ],

  // 테스트 설정 (Vitest)
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
  },
});
