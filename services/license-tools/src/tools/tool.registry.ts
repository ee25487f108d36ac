import { Inject, Injectable } from "@nestjs/common";
import { z } from "zod";

import { GitHubLicenseClient } from "../clients/github.client.js";
import { LibrariesIoClient } from "../clients/libraries-io.client.js";
import { LicenseFileClient } from "../clients/license-file.client.js";
import { SpdxTextClient } from "../clients/spdx.client.js";
import type { AppConfig } from "../config.js";
import { evaluateLicense } from "../policy.js";
import { ClauseAuditorService } from "../services/clause-auditor.service.js";
import { APP_CONFIG } from "../tokens.js";
import type { LookupResult, PolicyStatus } from "../types.js";
import {
  renderAuditMessage,
  renderLicenseMessage,
  renderSearchMessage,
  renderTextMessage,
} from "./messages.js";

export const TOOL_NAMES = [
  "libraries_io_license",
  "lookup_license_text",
  "fetch_repo_license",
  "search_license_issues",
  "analyze_license_text",
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export interface ToolOutput {
  tool: ToolName;
  result: LookupResult<unknown>;
  /** Plain-string rendering for agents that read tool output as text. */
  message: string;
  policy?: PolicyStatus;
}

export interface ToolParameter {
  name: string;
  type: "string" | "boolean" | "number" | "unknown";
  description: string;
  required: boolean;
}

export interface ToolDescriptor {
  name: ToolName;
  description: string;
  parameters: ToolParameter[];
}

export interface RegisteredTool {
  name: ToolName;
  description: string;
  parameters: z.AnyZodObject;
  /** Validates raw arguments (throws ZodError) and runs the tool. */
  invoke(args: unknown): Promise<ToolOutput>;
}

function defineTool<Shape extends z.ZodRawShape>(definition: {
  name: ToolName;
  description: string;
  parameters: z.ZodObject<Shape>;
  run: (args: z.infer<z.ZodObject<Shape>>) => Promise<ToolOutput>;
}): RegisteredTool {
  return {
    name: definition.name,
    description: definition.description,
    parameters: definition.parameters,
    invoke: (args) => definition.run(definition.parameters.parse(args ?? {})),
  };
}

function parameterType(schema: z.ZodTypeAny): ToolParameter["type"] {
  let inner = schema;
  while (inner instanceof z.ZodOptional || inner instanceof z.ZodNullable || inner instanceof z.ZodDefault) {
    inner = inner instanceof z.ZodDefault ? inner.removeDefault() : inner.unwrap();
  }
  if (inner instanceof z.ZodString) return "string";
  if (inner instanceof z.ZodBoolean) return "boolean";
  if (inner instanceof z.ZodNumber) return "number";
  return "unknown";
}

export function describeParameters(schema: z.AnyZodObject): ToolParameter[] {
  const shape: z.ZodRawShape = schema.shape;
  return Object.entries(shape).map(([name, field]) => ({
    name,
    type: parameterType(field),
    description: field.description ?? "",
    required: !field.isOptional(),
  }));
}

@Injectable()
export class ToolRegistry {
  private readonly tools: Map<string, RegisteredTool>;

  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    @Inject(LibrariesIoClient) private readonly librariesIo: LibrariesIoClient,
    @Inject(SpdxTextClient) private readonly spdx: SpdxTextClient,
    @Inject(LicenseFileClient) private readonly licenseFiles: LicenseFileClient,
    @Inject(GitHubLicenseClient) private readonly github: GitHubLicenseClient,
    @Inject(ClauseAuditorService) private readonly auditor: ClauseAuditorService,
  ) {
    this.tools = new Map(this.buildTools().map((tool) => [tool.name, tool]));
  }

  find(name: string): RegisteredTool | undefined {
    return this.tools.get(name);
  }

  describe(): ToolDescriptor[] {
    return Array.from(this.tools.values(), (tool) => ({
      name: tool.name,
      description: tool.description,
      parameters: describeParameters(tool.parameters),
    }));
  }

  private buildTools(): RegisteredTool[] {
    return [
      defineTool({
        name: "libraries_io_license",
        description:
          "Look up the declared license of a Maven artifact version using the Libraries.io API. " +
          "Returns the normalized license name (e.g. 'MIT', 'Apache-2.0') or 'Unknown'.",
        parameters: z.object({
          group: z.string().min(1).describe("Group ID of the Maven artifact (e.g. 'org.apache.commons')"),
          artifact: z.string().min(1).describe("Artifact ID of the Maven package (e.g. 'commons-lang3')"),
          version: z.string().min(1).describe("Version of the artifact to check (e.g. '3.12.0')"),
          checkPolicy: z
            .boolean()
            .optional()
            .describe("Also report whether the license is on the approved-license list"),
        }),
        run: async ({ group, artifact, version, checkPolicy }) => {
          const result = await this.librariesIo.lookup({ ecosystem: "Maven", group, artifact, version });
          const output: ToolOutput = {
            tool: "libraries_io_license",
            result,
            message: renderLicenseMessage(result),
          };
          if (checkPolicy) {
            output.policy =
              result.kind === "found" ? evaluateLicense(result.value, this.config.approvedLicenses) : "unknown";
          }
          return output;
        },
      }),
      defineTool({
        name: "lookup_license_text",
        description:
          "Retrieve the full text of a license from the SPDX license list by its SPDX identifier. " +
          "Returns an empty string if the text cannot be fetched.",
        parameters: z.object({
          license_name: z.string().min(1).describe("SPDX identifier of the license (e.g. 'MIT', 'Apache-2.0')"),
        }),
        run: async ({ license_name }) => {
          const result = await this.spdx.fetchText(license_name);
          return { tool: "lookup_license_text", result, message: renderTextMessage(result) };
        },
      }),
      defineTool({
        name: "fetch_repo_license",
        description:
          "Download the content of a LICENSE file from a URL. " +
          "Returns an empty string if the URL is empty or the download fails.",
        parameters: z.object({
          url: z.string().nullish().describe("Direct URL to the license file (e.g. a raw GitHub content URL)"),
        }),
        run: async ({ url }) => {
          const result = await this.licenseFiles.fetchFromUrl(url);
          return { tool: "fetch_repo_license", result, message: renderTextMessage(result) };
        },
      }),
      defineTool({
        name: "search_license_issues",
        description:
          "Search GitHub for a package and try to find its license, first through the repository " +
          "license API and then by listing LICENSE/COPYING files.",
        parameters: z.object({
          package_name: z.string().min(1).describe("Name of the package to search for on GitHub"),
        }),
        run: async ({ package_name }) => {
          const result = await this.github.search(package_name);
          return { tool: "search_license_issues", result, message: renderSearchMessage(result) };
        },
      }),
      defineTool({
        name: "analyze_license_text",
        description:
          "Analyze license text with a Gemini model. Returns 'OK' for standard permissive licenses, " +
          "'Unusual clause detected: <explanation>' when concerning clauses are found, or an error message.",
        parameters: z.object({
          text: z.string().describe("Complete text of the license to analyze"),
        }),
        run: async ({ text }) => {
          const result = await this.auditor.audit(text);
          return { tool: "analyze_license_text", result, message: renderAuditMessage(result) };
        },
      }),
    ];
  }
}
