/**
 * Mapper functions to convert database rows (snake_case) into API types (camelCase)
 */

import type {
  UserDbRow,
  CategoryDbRow,
  ServiceDbRow,
  ProjectDbRow,
  OrderDbRow,
  OrderFileDbRow,
  ArticleDbRow,
  ColorDbRow,
  ReviewDbRow,
  ContactRequestDbRow,
  ContentBlockDbRow,
  PageDbRow,
  SiteSettingDbRow,
} from "./lib/db/types.js";
import { parseJson } from "./lib/db/query.js";
import type {
  User,
  UserWithPassword,
  Category,
  Service,
  Project,
  Order,
  OrderFile,
  Article,
  Color,
  GradientStop,
  Review,
  ReviewImage,
  ContactRequest,
  ContentBlock,
  Page,
  SiteSetting,
} from "./types.js";

function optionalNumber(value: number | null): number | undefined {
  return value === null ? undefined : Number(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

export function mapUserFromDb(row: UserDbRow): User {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    fullName: row.full_name ?? undefined,
    isActive: Boolean(row.is_active),
    role: row.role,
    lastLogin: optionalNumber(row.last_login),
    createdAt: Number(row.created_at),
    updatedAt: Number(row.updated_at),
  };
}

export function mapUserWithPasswordFromDb(row: UserDbRow): UserWithPassword {
  return { ...mapUserFromDb(row), hashedPassword: row.hashed_password };
}

export function mapCategoryFromDb(row: CategoryDbRow): Category {
  return {
    id: row.id,
    name: row.name,
    slug: row.slug,
    description: row.description ?? undefined,
    isActive: Boolean(row.is_active),
    type: row.type,
    createdAt: Number(row.created_at),
    updatedAt: Number(row.updated_at),
  };
}

export function mapServiceFromDb(row: ServiceDbRow): Service {
  return {
    id: row.id,
    name: row.name,
    description: row.description ?? undefined,
    category: row.category ?? undefined,
    features: parseJson<string[]>(row.features, []),
    icon: row.icon ?? undefined,
    isActive: Boolean(row.is_active),
    createdAt: Number(row.created_at),
    updatedAt: Number(row.updated_at),
  };
}

export function mapProjectFromDb(row: ProjectDbRow): Project {
  const metadata = parseJson<unknown>(row.metadata, null);
  return {
    id: row.id,
    title: row.title,
    description: row.description ?? undefined,
    category: row.category,
    stlFile: row.stl_file ?? undefined,
    isFeatured: Boolean(row.is_featured),
    images: parseJson<string[]>(row.images, []),
    metadata: isRecord(metadata) ? metadata : undefined,
    estimatedPrice: optionalNumber(row.estimated_price),
    estimatedDurationHours: optionalNumber(row.estimated_duration_hours),
    complexityLevel: row.complexity_level ?? undefined,
    priceRangeMin: optionalNumber(row.price_range_min),
    priceRangeMax: optionalNumber(row.price_range_max),
    createdAt: Number(row.created_at),
    updatedAt: Number(row.updated_at),
  };
}

export function mapOrderFromDb(row: OrderDbRow): Order {
  const parsed = parseJson<unknown>(row.specifications, null);
  const specs = isRecord(parsed) ? parsed : undefined;
  const quantity = specs?.quantity;

  return {
    id: row.id,
    customerName: row.customer_name,
    customerEmail: row.customer_email,
    customerPhone: row.customer_phone ?? undefined,
    customerContact: row.customer_contact ?? undefined,
    alternativeContact: row.alternative_contact ?? undefined,
    serviceId: row.service_id,
    customerId: row.customer_id ?? undefined,
    specifications: specs,
    status: row.status,
    totalPrice: optionalNumber(row.total_price),
    source: row.source,
    notes: row.notes ?? undefined,
    deliveryNeeded: row.delivery_needed ?? undefined,
    deliveryDetails: row.delivery_details ?? undefined,
    color: optionalString(specs?.color),
    material: optionalString(specs?.material),
    quantity: typeof quantity === "number" ? quantity : 1,
    infill: specs?.infill,
    quality: optionalString(specs?.quality),
    urgency: optionalString(specs?.urgency),
    createdAt: Number(row.created_at),
    updatedAt: Number(row.updated_at),
  };
}

export function mapOrderFileFromDb(row: OrderFileDbRow): OrderFile {
  return {
    id: row.id,
    orderId: row.order_id,
    filePath: row.file_path,
    originalFilename: row.original_filename,
    fileSize: optionalNumber(row.file_size),
    fileType: row.file_type ?? undefined,
    createdAt: Number(row.created_at),
    updatedAt: Number(row.updated_at),
  };
}

export function mapArticleFromDb(row: ArticleDbRow): Article {
  return {
    id: row.id,
    title: row.title,
    slug: row.slug,
    content: row.content,
    excerpt: row.excerpt ?? undefined,
    featuredImage: row.featured_image ?? undefined,
    category: row.category,
    tags: parseJson<string[]>(row.tags, []),
    status: row.status,
    isPublished: Boolean(row.is_published),
    publishedAt: optionalNumber(row.published_at),
    views: Number(row.views),
    createdAt: Number(row.created_at),
    updatedAt: Number(row.updated_at),
  };
}

/**
 * Colors only expose the fields that belong to their type
 */
export function mapColorFromDb(row: ColorDbRow): Color {
  const common = {
    id: row.id,
    name: row.name,
    isActive: Boolean(row.is_active),
    isNew: Boolean(row.is_new),
    sortOrder: Number(row.sort_order),
    priceModifier: Number(row.price_modifier),
    createdAt: Number(row.created_at),
    updatedAt: Number(row.updated_at),
  };

  switch (row.type) {
    case "gradient":
      return {
        ...common,
        type: "gradient",
        gradientColors: parseJson<GradientStop[]>(row.gradient_colors, []),
        gradientDirection:
          row.gradient_direction === "radial" ? "radial" : "linear",
      };
    case "metallic":
      return {
        ...common,
        type: "metallic",
        metallicBase: row.metallic_base ?? "",
        metallicIntensity: row.metallic_intensity ?? 0.5,
      };
    case "solid":
      return { ...common, type: "solid", hexCode: row.hex_code ?? "" };
  }
}

export function mapReviewFromDb(row: ReviewDbRow): Review {
  return {
    id: row.id,
    customerName: row.customer_name,
    customerEmail: row.customer_email,
    rating: Number(row.rating),
    title: row.title ?? undefined,
    content: row.content,
    images: parseJson<ReviewImage[]>(row.images, []),
    isApproved: Boolean(row.is_approved),
    isFeatured: Boolean(row.is_featured),
    createdAt: Number(row.created_at),
    updatedAt: Number(row.updated_at),
  };
}

export function mapContactRequestFromDb(
  row: ContactRequestDbRow,
): ContactRequest {
  return {
    id: row.id,
    name: row.name,
    email: row.email,
    phone: row.phone ?? undefined,
    subject: row.subject,
    message: row.message,
    status: row.status,
    adminNotes: row.admin_notes ?? undefined,
    createdAt: Number(row.created_at),
    updatedAt: Number(row.updated_at),
  };
}

export function mapContentBlockFromDb(row: ContentBlockDbRow): ContentBlock {
  return {
    id: row.id,
    key: row.key,
    contentType: row.content_type,
    content: row.content ?? undefined,
    jsonContent: parseJson<unknown>(row.json_content, undefined),
    description: row.description ?? undefined,
    groupName: row.group_name ?? undefined,
    isActive: Boolean(row.is_active),
    sortOrder: Number(row.sort_order),
    createdAt: Number(row.created_at),
    updatedAt: Number(row.updated_at),
  };
}

export function mapPageFromDb(row: PageDbRow): Page {
  const content = parseJson<unknown>(row.content, null);
  return {
    id: row.id,
    slug: row.slug,
    title: row.title,
    metaTitle: row.meta_title ?? undefined,
    metaDescription: row.meta_description ?? undefined,
    content: isRecord(content) ? content : undefined,
    pageType: row.page_type,
    isActive: Boolean(row.is_active),
    createdAt: Number(row.created_at),
    updatedAt: Number(row.updated_at),
  };
}

export function mapSiteSettingFromDb(row: SiteSettingDbRow): SiteSetting {
  return {
    id: row.id,
    key: row.key,
    value: row.value ?? undefined,
    valueType: row.value_type,
    description: row.description ?? undefined,
    category: row.category,
    isPublic: Boolean(row.is_public),
    createdAt: Number(row.created_at),
    updatedAt: Number(row.updated_at),
  };
}
