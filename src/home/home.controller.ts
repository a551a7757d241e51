import { Controller, Get } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiOkResponse } from '@nestjs/swagger';

import { HomeService } from './home.service';

@ApiTags('Home')
@Controller()
export class HomeController {
  constructor(private service: HomeService) {}

  @Get()
  @ApiOperation({
    summary: 'Get Application Information',
    description: 'Name and environment of the API. This is a public endpoint.',
  })
  @ApiOkResponse({
    description: 'Application information',
    schema: {
      type: 'object',
      properties: {
        name: { type: 'string', example: 'Opinion Workflow API' },
        environment: { type: 'string', example: 'development' },
      },
    },
  })
  appInfo() {
    return this.service.appInfo();
  }
}
