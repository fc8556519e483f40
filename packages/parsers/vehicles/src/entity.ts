import { isRecord, maybeInt, type JsonRecord } from '@harvest/parser-sdk';

/** Fields produced from schema.org Car data; the detail page is authoritative for them. */
export const DETAIL_FIELDS = [
  'detail_entity_types',
  'detail_name',
  'detail_vehicle_identification_number',
  'detail_images',
  'detail_item_url',
  'detail_description',
  'detail_item_condition',
  'detail_brand_names',
  'detail_brand_raw',
  'detail_model',
  'detail_vehicle_configuration',
  'detail_vehicle_model_date',
  'detail_vehicle_transmission',
  'detail_vehicle_seating_capacity',
  'detail_color',
  'detail_body_type',
  'detail_drive_wheel_configuration',
  'detail_mileage_value',
  'detail_mileage_unit',
  'detail_mileage_raw',
  'detail_engine_fuel_type',
  'detail_engine_displacement',
  'detail_engine_raw',
  'detail_offer_price',
  'detail_offer_currency',
  'detail_offer_availability',
  'detail_offer_raw',
  'detail_main_entity_of_page',
  'detail_potential_action',
] as const;

function brandNames(brand: unknown): string[] {
  if (typeof brand === 'string') return [brand];
  if (isRecord(brand)) return typeof brand.name === 'string' ? [brand.name] : [];
  if (Array.isArray(brand)) {
    return brand.flatMap((item) => (isRecord(item) && typeof item.name === 'string' ? [item.name] : []));
  }
  return [];
}

function firstOffer(offers: unknown): JsonRecord | undefined {
  if (Array.isArray(offers)) {
    const [first] = offers;
    return isRecord(first) ? first : undefined;
  }
  return isRecord(offers) ? offers : undefined;
}

/**
 * Flatten a schema.org Car/Product entity into `detail_*` scalar fields.
 */
export function flattenCarEntity(entity: unknown): JsonRecord {
  if (!isRecord(entity)) return {};

  const flat: JsonRecord = {};
  const put = (key: string, value: unknown): void => {
    if (value !== undefined && value !== null) {
      flat[key] = value;
    }
  };

  const types = entity['@type'];
  if (types) put('detail_entity_types', Array.isArray(types) ? types : [types]);

  put('detail_name', entity.name);
  put('detail_vehicle_identification_number', entity.vehicleIdentificationNumber);

  const images = entity.image;
  if (Array.isArray(images)) put('detail_images', images);
  else if (typeof images === 'string') put('detail_images', [images]);

  put('detail_item_url', entity.url);
  put('detail_description', entity.description);
  put('detail_item_condition', entity.itemCondition);

  const brands = brandNames(entity.brand);
  if (brands.length > 0) put('detail_brand_names', brands);
  if (entity.brand) put('detail_brand_raw', entity.brand);

  put('detail_model', entity.model);
  put('detail_vehicle_configuration', entity.vehicleConfiguration);
  put('detail_vehicle_model_date', entity.vehicleModelDate);
  put('detail_vehicle_transmission', entity.vehicleTransmission);
  put('detail_vehicle_seating_capacity', maybeInt(entity.vehicleSeatingCapacity));
  put('detail_color', entity.color);
  put('detail_body_type', entity.bodyType);
  put('detail_drive_wheel_configuration', entity.driveWheelConfiguration);

  const mileage = entity.mileageFromOdometer;
  if (isRecord(mileage)) {
    put('detail_mileage_value', maybeInt(mileage.value));
    put('detail_mileage_unit', mileage.unitCode);
    put('detail_mileage_raw', mileage);
  }

  const engine = entity.vehicleEngine;
  if (isRecord(engine)) {
    put('detail_engine_fuel_type', engine.fuelType);
    put('detail_engine_displacement', engine.engineDisplacement);
    put('detail_engine_raw', engine);
  }

  const offer = firstOffer(entity.offers);
  if (offer) {
    put('detail_offer_price', maybeInt(offer.price));
    put('detail_offer_currency', offer.priceCurrency);
    put('detail_offer_availability', offer.availability);
    put('detail_offer_raw', offer);
  }

  if (isRecord(entity.mainEntityOfPage)) put('detail_main_entity_of_page', entity.mainEntityOfPage);
  if (isRecord(entity.potentialAction)) put('detail_potential_action', entity.potentialAction);

  return flat;
}

export function isCarEntity(node: unknown): node is JsonRecord {
  if (!isRecord(node)) return false;
  const type = node['@type'];
  return type === 'Car' || (Array.isArray(type) && type.includes('Car'));
}
