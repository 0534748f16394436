/**
 * Express server - evaluation API.
 */

import { createApp } from "./app.js";
import { loadConfig } from "../src/config.js";
import { checkProviderCredentials } from "../src/credentials.js";
import { EvaluationPipeline } from "../src/evaluator/evaluationPipeline.js";
import { createExecutor } from "../src/executor/index.js";

async function start() {
  const config = loadConfig();
  const { provider } = config;

  const credentials = checkProviderCredentials(provider);
  if (credentials.status === "missing") {
    console.warn(
      `[Server] ${credentials.missingVars?.join(" / ")} not set: every evaluation will return the fallback result.`
    );
  }

  const pipeline = new EvaluationPipeline({
    provider,
    executor: createExecutor(provider),
    logPath: config.evaluationLogPath,
  });
  const app = createApp({ pipeline, provider, frontendUrl: config.frontendUrl });

  app.listen(config.port, "0.0.0.0", () => {
    console.log(`Server running at http://0.0.0.0:${config.port}`);
    console.log(`Provider: ${provider.kind} model=${provider.model} base=${provider.baseUrl ?? "(sdk default)"} timeoutMs=${provider.timeoutMs}`);
  });
}
start().catch((e) => {
  console.error("Server failed to start:", e);
  process.exit(1);
});
