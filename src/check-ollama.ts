/**
 * check-ollama.ts — Verify that a local Ollama server can drive the agent
 *
 * Run with `npm run check:ollama`. Exits 1 when the server is unreachable,
 * has no models, or the smoke test fails.
 */

import { config } from "./config.js";
import { createOllamaProvider } from "./providers/openai-provider.js";
import { fetchOllamaModels, pickTestModel, runToolSmokeTest, PREFERRED_TEST_MODEL } from "./ollama.js";

const SETUP_HINTS = `
📝 Quick start:
  1. Install Ollama: https://ollama.com/download
  2. Pull a model:   ollama pull ${PREFERRED_TEST_MODEL}
  3. Start it:       ollama serve
  4. Re-run:         npm run check:ollama
`;

const MODEL_HINTS = `
📚 Models that handle tool calls well:
  ollama pull llama3.2        # small and fast
  ollama pull llama3.2:3b     # balanced
  ollama pull qwen2.5:7b      # good multilingual support
  ollama pull mistral:7b      # higher quality
`;

async function main(): Promise<number> {
    console.log(`🔍 Checking Ollama at ${config.OLLAMA_HOST}…`);

    let models: string[];
    try {
        models = await fetchOllamaModels(config.OLLAMA_HOST);
    } catch (err) {
        console.log(`❌ Cannot reach Ollama: ${err instanceof Error ? err.message : String(err)}`);
        console.log(SETUP_HINTS);
        return 1;
    }

    console.log(`✅ Ollama is running, ${models.length} model(s) installed`);
    for (const m of models) console.log(`   - ${m}`);

    const model = pickTestModel(models);
    if (!model) {
        console.log(`\n⚠️  No models installed. Pull one first: ollama pull ${PREFERRED_TEST_MODEL}`);
        return 1;
    }
    if (!model.includes(PREFERRED_TEST_MODEL)) {
        console.log(`\n⚠️  ${PREFERRED_TEST_MODEL} not found, testing with ${model} instead`);
    }

    console.log(`\n🧪 Testing a tool call with ${model}…`);
    try {
        const result = await runToolSmokeTest(createOllamaProvider(config.OLLAMA_HOST, model));
        console.log(`🤖 Reply: ${result.reply}`);
        if (!result.toolCalled) {
            console.log("\n⚠️  The model answered without calling the tool. Try a model with tool support.");
            console.log(MODEL_HINTS);
            return 1;
        }
    } catch (err) {
        console.log(`\n❌ Smoke test failed: ${err instanceof Error ? err.message : String(err)}`);
        console.log(MODEL_HINTS);
        return 1;
    }

    console.log("\n🎉 Ollama is ready. Start the assistant with: npm start");
    console.log(`   Set OLLAMA_MODEL=${model} in .env to use this model.`);
    return 0;
}

main()
    .then((code) => process.exit(code))
    .catch((err) => {
        console.error("Fatal error during Ollama check:", err);
        process.exit(1);
    });
