import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    env: {
      NODE_ENV: 'test',
      ADMIN_SECRET_TOKEN: 'test-admin-token',
      SAML_IDP_USER_AGREEMENT_VALID_FOR: '24',
      METADATA_HTTP_TIMEOUT: '2000'
    }
  }
});
