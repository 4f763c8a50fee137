import { Body, Controller, Get, HttpCode, HttpStatus, Param, Post } from '@nestjs/common';
import { CafesService } from './cafes.service';
import { CreateCafeDto } from './dto/create-cafe.dto';

@Controller()
export class CafesController {
  constructor(private readonly service: CafesService) {}

  @Post('/add_cafe')
  @HttpCode(HttpStatus.OK)
  add(@Body() dto: CreateCafeDto) {
    return this.service.addCafe(dto);
  }

  @Get('/cafes')
  list() {
    return this.service.listCafes();
  }

  // express has already URL-decoded the name
  @Get('/cafe/:name')
  findOne(@Param('name') name: string) {
    return this.service.getCafeByName(name);
  }
}
