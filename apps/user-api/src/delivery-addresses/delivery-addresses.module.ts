// Import Module decorator
import { Module } from '@nestjs/common';
import { DeliveryAddressesController } from './delivery-addresses.controller';
import { DeliveryAddressesService } from './delivery-addresses.service';
import { UserDeliveryAddressesRepository } from './user-delivery-addresses.repository';

@Module({
  controllers: [DeliveryAddressesController],
  providers: [UserDeliveryAddressesRepository, DeliveryAddressesService]
})
export class DeliveryAddressesModule {}
