import { Module } from "@nestjs/common";

import { GeminiClient } from "./clients/gemini.client.js";
import { GitHubLicenseClient } from "./clients/github.client.js";
import { globalFetch } from "./clients/http.js";
import { LibrariesIoClient } from "./clients/libraries-io.client.js";
import { LicenseFileClient } from "./clients/license-file.client.js";
import { SpdxTextClient } from "./clients/spdx.client.js";
import { loadConfig } from "./config.js";
import { HealthController } from "./controllers/health.controller.js";
import { ToolsController } from "./controllers/tools.controller.js";
import { ClauseAuditorService } from "./services/clause-auditor.service.js";
import { APP_CONFIG, FETCH_IMPL } from "./tokens.js";
import { ToolRegistry } from "./tools/tool.registry.js";

const configProvider = {
  provide: APP_CONFIG,
  useFactory: () => loadConfig(),
};

const fetchProvider = {
  provide: FETCH_IMPL,
  useValue: globalFetch,
};

@Module({
  imports: [],
  controllers: [ToolsController, HealthController],
  providers: [
    configProvider,
    fetchProvider,
    LibrariesIoClient,
    SpdxTextClient,
    LicenseFileClient,
    GitHubLicenseClient,
    GeminiClient,
    ClauseAuditorService,
    ToolRegistry,
  ],
})
export class AppModule {}
