import {
  Controller,
  Get,
  Param,
  ParseIntPipe,
  Query,
  UseGuards,
} from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import {
  ApiBearerAuth,
  ApiForbiddenResponse,
  ApiNotFoundResponse,
  ApiOkResponse,
  ApiOperation,
  ApiParam,
  ApiTags,
} from '@nestjs/swagger';
import { Roles } from '../roles/roles.decorator';
import { RoleEnum } from '../roles/roles.enum';
import { RolesGuard } from '../roles/roles.guard';
import { DepartmentStatisticsResponseDto } from './dto/department-statistics-response.dto';
import { StatisticsQueryDto } from './dto/statistics-query.dto';
import { OpinionRequestsService } from './opinion-requests.service';

@ApiTags('Opinion Statistics')
@Controller({ path: 'opinion-statistics', version: '1' })
@UseGuards(AuthGuard('jwt'), RolesGuard)
@Roles(RoleEnum.superAdmin, RoleEnum.systemAdmin, RoleEnum.departmentHead)
@ApiBearerAuth()
export class OpinionStatisticsController {
  constructor(private readonly service: OpinionRequestsService) {}

  @Get('departments/:departmentId')
  @ApiOperation({
    summary: 'Request counts and mean completion time for a department',
    description:
      'Counts requests owned by the department and created inside the optional window.',
  })
  @ApiParam({ name: 'departmentId', type: Number })
  @ApiOkResponse({ type: DepartmentStatisticsResponseDto })
  @ApiForbiddenResponse({ description: 'Role not allowed' })
  @ApiNotFoundResponse({ description: 'Department not found' })
  departmentStatistics(
    @Param('departmentId', ParseIntPipe) departmentId: number,
    @Query() query: StatisticsQueryDto,
  ): Promise<DepartmentStatisticsResponseDto> {
    return this.service.departmentStatistics(departmentId, query);
  }
}
