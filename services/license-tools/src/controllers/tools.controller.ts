import {
  BadGatewayException,
  BadRequestException,
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Inject,
  NotFoundException,
  Param,
  Post,
} from "@nestjs/common";
import { ZodError } from "zod";

import { UpstreamRequestError } from "../errors.js";
import { ToolRegistry, type ToolDescriptor, type ToolOutput } from "../tools/tool.registry.js";

@Controller("tools")
export class ToolsController {
  constructor(
    @Inject(ToolRegistry)
    private readonly registry: ToolRegistry,
  ) {}

  @Get()
  list(): ToolDescriptor[] {
    return this.registry.describe();
  }

  @Post(":name")
  @HttpCode(HttpStatus.OK)
  async invoke(@Param("name") name: string, @Body() body: unknown): Promise<ToolOutput> {
    const tool = this.registry.find(name);
    if (!tool) {
      throw new NotFoundException(`Unknown tool: ${name}`);
    }
    try {
      return await tool.invoke(body);
    } catch (error) {
      if (error instanceof ZodError) {
        throw new BadRequestException({ error: "Invalid tool arguments", issues: error.issues });
      }
      if (error instanceof UpstreamRequestError) {
        throw new BadGatewayException({ error: error.message, service: error.service });
      }
      throw error;
    }
  }
}
