import { IsBoolean, IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';

export class CreateCafeDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(250)
  name!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(500)
  map_url!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(500)
  img_url!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(250)
  location!: string;

  @IsBoolean()
  has_sockets!: boolean;

  @IsBoolean()
  has_toilet!: boolean;

  @IsBoolean()
  has_wifi!: boolean;

  @IsBoolean()
  can_take_calls!: boolean;

  @IsOptional()
  @IsString()
  @MaxLength(250)
  seats?: string | null;

  @IsOptional()
  @IsString()
  @MaxLength(250)
  coffee_price?: string | null;
}
