import {
  RecordParseError,
  compact,
  defineParser,
  fillTemplate,
  getPath,
  isRecord,
  loadNextData,
  maybeFloat,
  maybeInt,
  type DatasetConfig,
  type JsonRecord,
  type ListingStub,
  type PageContext,
} from '@harvest/parser-sdk';
import { cleanLocation, flattenFields, normalizeSegment, toEpochAndIso, type ListingSegment } from './fields.js';

export { cleanLocation, flattenFields, normalizeSegment, toEpochAndIso } from './fields.js';
export type { ListingSegment } from './fields.js';

const HITS_PATH = ['props', 'pageProps', 'data', 'data', 'hits'];
const DETAIL_HITS_PATH = ['props', 'pageProps', 'data', 'data', 'listingDetails', 'hits', 'hits'];

export const DETAIL_FIELDS = [
  'detail_id',
  'detail_reference_number',
  'detail_name',
  'detail_price',
  'detail_bedrooms',
  'detail_bathrooms',
  'detail_total_area_sqft',
  'detail_property_type',
  'detail_listing_status',
  'detail_listing_type',
  'detail_listing_area',
  'detail_description',
  'detail_brief_description',
  'detail_images',
  'detail_video_url',
  'detail_image_count',
  'detail_private_amenities',
  'detail_commercial_amenities',
  'detail_latitude',
  'detail_longitude',
  'detail_country',
  'detail_city',
  'detail_address',
  'detail_agent_name',
  'detail_agent_mobile',
  'detail_agent_email',
  'detail_agent_whatsapp',
  'detail_transferred_date_epoch',
  'detail_transferred_date_iso',
] as const;

function stringId(value: unknown): string | undefined {
  if (typeof value === 'string' && value) return value;
  if (typeof value === 'number') return String(value);
  return undefined;
}

/**
 * An explicit dataset category wins; otherwise the hit's listing type decides.
 */
export function resolveSegment(listingType: unknown, explicit?: string): ListingSegment {
  return normalizeSegment(explicit ?? listingType);
}

export function buildDetailUrl(
  config: DatasetConfig,
  reference: unknown,
  segment: ListingSegment,
): string | undefined {
  const ref = stringId(reference);
  if (!config.detailUrlTemplate || !ref) return undefined;
  return fillTemplate(config.detailUrlTemplate, { category: segment, reference: ref });
}

export function parseListingPage(html: string, context: PageContext): ListingStub[] {
  const hits = getPath(loadNextData(html), HITS_PATH);
  if (!Array.isArray(hits)) return [];

  const stubs: ListingStub[] = [];
  for (const hit of hits) {
    if (!isRecord(hit)) continue;

    const fields = flattenFields(hit.fields);
    const identifier =
      stringId(fields.id) ??
      stringId(hit._id) ??
      stringId(fields.pba__broker_s_listing_id__c) ??
      stringId(fields.pba__property__c);
    if (!identifier) continue;

    const reference = fields.pba__broker_s_listing_id__c;
    const listingType = fields.pba__listingtype__c;
    const segment = resolveSegment(listingType, context.config.listingCategory);

    stubs.push({
      identifier,
      sourceUrl: context.url,
      detailUrl: buildDetailUrl(context.config, reference, segment),
      listingCategory: segment,
      fields: compact({
        id: identifier,
        reference_number: reference,
        price: maybeInt(fields.pba__listingprice_pb__c),
        bedrooms: maybeInt(fields.pba__bedrooms_pb__c),
        bathrooms: maybeInt(fields.pba__fullbathrooms_pb__c),
        total_area_sqft: maybeFloat(fields.pba__totalarea_pb__c),
        listing_area: cleanLocation(fields.listing_area),
        property_type: fields.property_type_website__c,
        listing_status: fields.pba__status__c,
        listing_type: listingType,
        business_type: fields.business_type_aa__c,
        latitude: maybeFloat(fields.pba__latitude_pb__c),
        longitude: maybeFloat(fields.pba__longitude_pb__c),
        listing_agent_name: fields.listing_agent_name,
        listing_agent_mobile: fields.listing_agent_mobile,
        listing_agent_email: fields.listing_agent_Email,
        listing_agent_whatsapp: fields.listing_agent_Whatsapp,
        property_video: fields.property_video,
        images: fields.images,
        name: fields.name,
        property_id: fields.pba__property__c,
        transferred_date: fields.transferred_date__c,
        source_page: context.page,
      }),
    });
  }

  return stubs;
}

export function parseDetailPage(html: string, stub: ListingStub): JsonRecord {
  let payload: JsonRecord;
  try {
    payload = loadNextData(html);
  } catch (error) {
    throw new RecordParseError(stub.identifier, 'detail page has no bootstrap payload', error);
  }

  const hits = getPath(payload, DETAIL_HITS_PATH);
  const first: unknown = Array.isArray(hits) ? hits[0] : undefined;
  if (!isRecord(first)) {
    throw new RecordParseError(stub.identifier, 'no listing details on detail page');
  }

  const fields = flattenFields(first.fields);
  const transferred = toEpochAndIso(fields.transferred_date__c);

  return compact({
    detail_id: fields.id,
    detail_reference_number: fields.pba__broker_s_listing_id__c,
    detail_name: fields.name,
    detail_price: maybeInt(fields.pba__listingprice_pb__c),
    detail_bedrooms: maybeInt(fields.pba__bedrooms_pb__c),
    detail_bathrooms: maybeInt(fields.pba__fullbathrooms_pb__c),
    detail_total_area_sqft: maybeFloat(fields.pba__totalarea_pb__c),
    detail_property_type: fields.property_type_website__c,
    detail_listing_status: fields.pba__status__c,
    detail_listing_type: fields.pba__listingtype__c,
    detail_listing_area: cleanLocation(fields.listing_area),
    detail_description: fields.pba__description_pb__c,
    detail_brief_description: fields.pba_brief_description__c,
    detail_images: fields.images,
    detail_video_url: fields.property_video,
    detail_image_count: maybeInt(fields.image_count),
    detail_private_amenities: fields.pba_uaefields__private_amenities__c,
    detail_commercial_amenities: fields.pba_uaefields__commercial_amenities__c,
    detail_latitude: maybeFloat(fields.pba__latitude_pb__c),
    detail_longitude: maybeFloat(fields.pba__longitude_pb__c),
    detail_country: fields.pba__country_pb__c,
    detail_city: fields.pba__city_pb__c,
    detail_address: fields.pba__address_pb__c,
    detail_agent_name: fields.listing_agent_name,
    detail_agent_mobile: fields.listing_agent_mobile,
    detail_agent_email: fields.listing_agent_Email,
    detail_agent_whatsapp: fields.listing_agent_Whatsapp,
    detail_transferred_date_epoch: transferred?.epoch,
    detail_transferred_date_iso: transferred?.iso,
  });
}

export const propertiesParser = defineParser({
  manifest: {
    id: 'properties',
    name: 'Property sales and lettings',
    version: '1.0.0',
  },
  mode: 'paged',
  timestampFields: () => ['detail_transferred_date_iso', 'transferred_date'],
  numericFields: ['price', 'bedrooms', 'bathrooms', 'total_area_sqft', 'detail_price', 'detail_total_area_sqft'],
  textFields: ['detail_description', 'detail_brief_description'],
  authoritativeFields: DETAIL_FIELDS,
  pageUrl: (config: DatasetConfig, page: number) => fillTemplate(config.listingUrlTemplate, { page }),
  parseListing: parseListingPage,
  parseDetail: parseDetailPage,
});
