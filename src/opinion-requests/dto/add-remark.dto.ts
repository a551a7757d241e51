import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString } from 'class-validator';

export class AddRemarkDto {
  @ApiProperty({ example: 'Finance asked for the 2023 figures as well.' })
  @IsString()
  @IsNotEmpty()
  content!: string;
}
