import { bootstrap } from "../../../libs/bootstrap/startup.js";
import { loadAccessConfig } from "../../../libs/bootstrap/config.js";
import { logger } from "../../../libs/logging/logger.js";
import { createAccessApp } from "./app.js";

async function main() {
    const config = loadAccessConfig();
    logger.level = config.RBAC_LOG_LEVEL;

    const core = await bootstrap("access-api", config);
    const app = createAccessApp(core, config);

    const server = app.listen(config.RBAC_HTTP_PORT, () => {
        logger.info({ port: config.RBAC_HTTP_PORT }, "Access API listening");
    });

    const shutdown = (signal: string) => {
        logger.info({ signal }, "Shutting down");
        server.close(() => {
            core.audit.flush()
                .then(() => process.exit(0))
                .catch(err => {
                    logger.error({ err }, "Audit flush failed during shutdown");
                    process.exit(1);
                });
        });
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch(err => {
    logger.fatal(err);
    process.exit(1);
});
