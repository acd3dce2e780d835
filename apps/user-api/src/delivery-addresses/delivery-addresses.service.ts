import { Injectable } from '@nestjs/common';
import type { AccessContext } from '../authorization/access-context';
import type { UserId } from '../authorization/authorization.types';
import type { CreateDeliveryAddressDto } from './dto/create-delivery-address.dto';
import type { UpdateDeliveryAddressDto } from './dto/update-delivery-address.dto';
import type { UserDeliveryAddress } from './user-delivery-address.entity';
import { UserDeliveryAddressesRepository } from './user-delivery-addresses.repository';

/**
 * DeliveryAddressesService - Delivery address use cases
 */
@Injectable()
export class DeliveryAddressesService {
  constructor(private readonly addresses: UserDeliveryAddressesRepository) {}

  listForUser(access: AccessContext, userId: UserId): Promise<UserDeliveryAddress[]> {
    return this.addresses.listForUser(access, userId);
  }

  /** Omitted components are stored as NULL; a new address is not priority unless asked */
  create(access: AccessContext, dto: CreateDeliveryAddressDto): Promise<UserDeliveryAddress> {
    return this.addresses.create(access, {
      userId: dto.userId,
      administrativeAreaLevel1: dto.administrativeAreaLevel1 ?? null,
      administrativeAreaLevel2: dto.administrativeAreaLevel2 ?? null,
      country: dto.country,
      locality: dto.locality ?? null,
      political: dto.political ?? null,
      postalCode: dto.postalCode,
      route: dto.route ?? null,
      streetNumber: dto.streetNumber ?? null,
      address: dto.address ?? null,
      isPriority: dto.isPriority ?? false
    });
  }

  update(access: AccessContext, id: number, dto: UpdateDeliveryAddressDto): Promise<UserDeliveryAddress> {
    return this.addresses.update(access, id, dto);
  }

  delete(access: AccessContext, id: number): Promise<UserDeliveryAddress> {
    return this.addresses.delete(access, id);
  }
}
