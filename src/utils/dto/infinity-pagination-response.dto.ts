import { ApiProperty } from '@nestjs/swagger';

export class InfinityPaginationResponseDto<T> {
  data!: T[];

  @ApiProperty({ type: Boolean, example: true })
  hasNextPage!: boolean;
}
