/**
 * Node.js エントリーポイント
 *
 * 設定を読み込み、シグナリングサーバーを起動する。
 * SIGINT / SIGTERM で全ルームを閉じて終了する。
 */

import { createApp, listen } from "./app";
import { loadConfig } from "./config";
import { logServerListening, logUnexpectedError } from "./signaling/logger";

async function main(): Promise<void> {
  const config = loadConfig();
  const { signaling } = await createApp(config);
  await listen(signaling, config.host, config.port);
  logServerListening(config.host, config.port);

  let stopping = false;
  const stop = () => {
    if (stopping) return;
    stopping = true;
    void signaling
      .close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logUnexpectedError("shutdown", error);
        process.exit(1);
      });
  };
  process.on("SIGINT", stop);
  process.on("SIGTERM", stop);
}

main().catch((error: unknown) => {
  logUnexpectedError("startup", error);
  process.exit(1);
});
