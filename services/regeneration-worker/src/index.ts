import { readFile } from "node:fs/promises";

import { bootstrap } from "../../../libs/bootstrap/startup.js";
import { PROPOSER_CONFIG_GUARDS } from "../../../libs/bootstrap/config/proposer-config.js";
import { ErrorSanitizer, ForgeError } from "../../../libs/errors/sanitizer.js";
import { logger } from "../../../libs/logging/logger.js";
import { ChatCompletionProposer } from "../../../libs/proposer/chatCompletionProposer.js";
import { RegenerationController } from "../../../libs/regeneration/regenerationController.js";
import { formatSessionReport } from "../../../libs/regeneration/sessionReport.js";
import { DockerSandboxRuntime } from "../../../libs/sandbox/dockerRuntime.js";
import { SandboxExecutor } from "../../../libs/sandbox/sandboxExecutor.js";
import { SandboxSlotPool } from "../../../libs/sandbox/slotPool.js";

const USAGE = "usage: regeneration-worker <sample-file> [initial-script-file]";

async function readSampleLines(path: string): Promise<string[]> {
    const text = await readFile(path, "utf8");
    const lines = text.split(/\r?\n/).filter(line => line.trim() !== "");
    if (lines.length === 0) {
        throw new ForgeError(`Sample file ${path} contains no log lines`, { path }, "INPUT", { contextLabel: "RegenerationWorker" });
    }
    return lines;
}

async function main(argv: readonly string[]): Promise<number> {
    const [samplePath, scriptPath] = argv;
    if (!samplePath) {
        process.stderr.write(`${USAGE}\n`);
        return 64;
    }

    const config = bootstrap("regeneration-worker", PROPOSER_CONFIG_GUARDS);

    const sampleInputs = await readSampleLines(samplePath);
    const initialScript = scriptPath ? await readFile(scriptPath, "utf8") : undefined;

    const executor = new SandboxExecutor(
        new DockerSandboxRuntime({ dockerBinary: config.dockerBinary, image: config.sandboxImage }),
        new SandboxSlotPool(config.sandboxConcurrencyLimit)
    );
    const proposer = new ChatCompletionProposer({
        baseUrl: process.env.FORGE_PROPOSER_URL,
        apiKey: process.env.FORGE_PROPOSER_API_KEY,
        model: process.env.FORGE_PROPOSER_MODEL
    });
    const controller = new RegenerationController({ executor, proposer, config });

    const abort = new AbortController();
    process.once("SIGINT", () => abort.abort());
    process.once("SIGTERM", () => abort.abort());

    logger.info({ samplePath, sampleCount: sampleInputs.length }, "Regeneration Worker initialized");

    const result = await controller.run({
        sampleInputs,
        ...(initialScript !== undefined ? { initialScript } : {}),
        signal: abort.signal
    });

    process.stdout.write(`${JSON.stringify(result, null, 2)}\n`);
    process.stderr.write(`${formatSessionReport(result)}\n`);
    return result.status === "SUCCEEDED" ? 0 : 2;
}

main(process.argv.slice(2))
    .then(code => {
        process.exitCode = code;
    })
    .catch(err => {
        const safe = ErrorSanitizer.sanitize(err, "RegenerationWorker");
        logger.fatal({ incidentId: safe.incidentId, category: safe.category }, safe.publicMessage);
        process.exitCode = 1;
    });
