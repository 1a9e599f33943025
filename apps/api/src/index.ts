import { buildApp } from "./app.js";
import { loadEnv } from "./config/env.js";
import { createLogger } from "./lib/logger.js";
import { createUploadCipherFactory } from "./modules/cloud115/crypto/upload-cipher.js";
import { Pan115Session } from "./modules/cloud115/session.js";
import { Cloud115Adapter } from "./modules/storage/adapters/cloud-115-adapter.js";

const env = loadEnv();
const logger = createLogger(env.LOG_LEVEL);

const session = new Pan115Session(
  {
    cookie: env.CLOUD115_COOKIE,
    qrCodeToken: env.CLOUD115_QRCODE_TOKEN,
    qrCodeSource: env.CLOUD115_QRCODE_SOURCE,
    pageSize: env.CLOUD115_PAGE_SIZE,
    userAgent: env.CLOUD115_USER_AGENT,
    proxyUrl: env.CLOUD115_PROXY_URL,
    tlsInsecureSkipVerify: env.CLOUD115_TLS_INSECURE_SKIP_VERIFY
  },
  {
    createUploadCipher: createUploadCipherFactory(env.CLOUD115_ECDH_PEER_KEY),
    logger
  }
);
const adapter = new Cloud115Adapter(session, { logger });
const app = await buildApp({ session, adapter, logger });

try {
  await app.listen({ port: env.API_PORT, host: "0.0.0.0" });
  await adapter.ensureLoggedIn().catch((error) => {
    app.log.warn({ err: error }, "Initial 115 login failed; will retry on first request");
  });
} catch (err) {
  app.log.error(err);
  process.exit(1);
}
