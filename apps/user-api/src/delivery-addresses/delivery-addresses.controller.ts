// Import NestJS controller decorators
import { Body, Controller, Delete, Get, Param, ParseIntPipe, Post, Put, UseGuards } from '@nestjs/common';
// Import Swagger decorators for API documentation
import { ApiBearerAuth, ApiBody, ApiTags } from '@nestjs/swagger';
// Import principal resolution and ACL context guards
import { JwtAuthGuard } from '../auth/jwt-auth.guard';
import { AclContextGuard } from '../authorization/acl-context.guard';
import { CurrentAccess } from '../authorization/current-access.decorator';
import type { AccessContext } from '../authorization/access-context';
// Import DTOs
import { CreateDeliveryAddressDto } from './dto/create-delivery-address.dto';
import { UpdateDeliveryAddressDto } from './dto/update-delivery-address.dto';
// Import delivery address service
import { DeliveryAddressesService } from './delivery-addresses.service';

/**
 * DeliveryAddressesController - Users' delivery addresses
 * Routes: /users/:id/delivery-addresses, /delivery-addresses
 */
@ApiTags('delivery-addresses')
@ApiBearerAuth('bearer')
@Controller()
@UseGuards(JwtAuthGuard, AclContextGuard)
export class DeliveryAddressesController {
  constructor(private readonly addresses: DeliveryAddressesService) {}

  /** GET /users/:id/delivery-addresses - Newest first */
  @Get('users/:id/delivery-addresses')
  list(@Param('id', ParseIntPipe) userId: number, @CurrentAccess() access: AccessContext) {
    return this.addresses.listForUser(access, userId);
  }

  @Post('delivery-addresses')
  @ApiBody({
    type: CreateDeliveryAddressDto,
    examples: {
      basic: {
        summary: 'Add address',
        value: { userId: 42, country: 'NL', postalCode: '1011AB', locality: 'Amsterdam', isPriority: true }
      }
    }
  })
  create(@Body() dto: CreateDeliveryAddressDto, @CurrentAccess() access: AccessContext) {
    return this.addresses.create(access, dto);
  }

  @Put('delivery-addresses/:id')
  update(
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: UpdateDeliveryAddressDto,
    @CurrentAccess() access: AccessContext
  ) {
    return this.addresses.update(access, id, dto);
  }

  @Delete('delivery-addresses/:id')
  delete(@Param('id', ParseIntPipe) id: number, @CurrentAccess() access: AccessContext) {
    return this.addresses.delete(access, id);
  }
}
