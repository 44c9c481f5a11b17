import { defineConfig } from 'vite'
import react from '@vitejs/plugin-react'

// Get version from package.json
const appVersion = JSON.stringify(process.env.npm_package_version || 'unknown');

export default defineConfig(({ mode }) => {
  const plugins = [react()];

  return {
    plugins,
    define: {
      '__APP_VERSION__': appVersion,
    },
    build: {
      // Source maps only outside production builds
      sourcemap: mode !== 'production',
    },
  };
})
