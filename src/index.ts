import { loadConfig } from "./config.js";
import { logger } from "./logger.js";
import { createApp } from "./transport.js";

const config = loadConfig();
const app = createApp(config);

app.listen(config.PORT, () => {
	logger.info(`citecheck MCP server listening on port ${config.PORT} (${config.NODE_ENV})`);
	logger.debug(`validation cache holds up to ${config.VALIDATION_CACHE_SIZE} results`);
});
