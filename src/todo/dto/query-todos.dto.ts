import { Transform } from 'class-transformer';
import { IsOptional, IsString } from 'class-validator';
import { toIdList } from '../../common/validation/transforms';

export class QueryTodosDto {
  @IsString()
  @IsOptional()
  id?: string;

  @Transform(({ value }) => toIdList(value))
  @IsString({ each: true })
  @IsOptional()
  ids?: string[];

  @IsString()
  @IsOptional()
  text_contains?: string;
}

export class DeleteTodosDto {
  @Transform(({ value }) => toIdList(value))
  @IsString({ each: true })
  ids!: string[];
}
