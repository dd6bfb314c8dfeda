import { Controller, Get, Post, Param, Body, ParseUUIDPipe } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { ModelRegistryService } from '../services/model-registry.service';
import { RegisterModelDto } from '../dto/register-model.dto';

@ApiTags('Models')
@Controller('models')
export class ModelRegistryController {
  constructor(private readonly modelRegistryService: ModelRegistryService) {}

  /**
   * Register a model version
   */
  @Post()
  @ApiOperation({ summary: 'Register a new model version', description: 'New versions start inactive' })
  @ApiResponse({ status: 201, description: 'Registered version' })
  @ApiResponse({ status: 409, description: 'Version already registered for this model' })
  async register(@Body() dto: RegisterModelDto) {
    const version = await this.modelRegistryService.register(dto);
    return { success: true, data: version };
  }

  @Get(':name')
  @ApiOperation({ summary: 'List versions of a model, newest first' })
  async list(@Param('name') name: string) {
    const versions = await this.modelRegistryService.list(name);
    return { success: true, data: versions, meta: { count: versions.length } };
  }

  @Get(':name/active')
  @ApiOperation({ summary: 'Get the active version of a model' })
  @ApiResponse({ status: 404, description: 'No active version' })
  async getActive(@Param('name') name: string) {
    const version = await this.modelRegistryService.getActive(name);
    return { success: true, data: version };
  }

  /**
   * Make a version the production model
   */
  @Post(':id/promote')
  @ApiOperation({ summary: 'Promote a version to active' })
  @ApiResponse({ status: 404, description: 'Unknown version' })
  async promote(@Param('id', ParseUUIDPipe) id: string) {
    const version = await this.modelRegistryService.promote(id);
    return { success: true, data: version };
  }

  @Post(':name/rollback')
  @ApiOperation({ summary: 'Reactivate the previously promoted version' })
  async rollback(@Param('name') name: string) {
    const version = await this.modelRegistryService.rollback(name);
    return { success: true, data: version };
  }
}
