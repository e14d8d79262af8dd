/**
 * API types (camelCase). Timestamps are epoch milliseconds.
 */

import type {
  UserRole,
  CategoryType,
  ComplexityLevel,
  OrderStatus,
  OrderSource,
  ArticleStatus,
  ColorType,
  ContactStatus,
  ContentType,
  SettingValueType,
} from "./lib/db/types.js";
import type { FileCategory } from "./lib/storage/files.js";

export type {
  UserRole,
  CategoryType,
  ComplexityLevel,
  OrderStatus,
  OrderSource,
  ArticleStatus,
  ColorType,
  ContactStatus,
  ContentType,
  SettingValueType,
  FileCategory,
};

export type Timestamped = {
  id: string;
  createdAt: number;
  updatedAt: number;
};

// Users

export type User = Timestamped & {
  username: string;
  email: string;
  fullName?: string;
  isActive: boolean;
  role: UserRole;
  lastLogin?: number;
};

export type UserWithPassword = User & { hashedPassword: string };

export type CreateUserInput = {
  username: string;
  email: string;
  password: string;
  fullName?: string;
  role?: UserRole;
  isActive?: boolean;
};

export type UpdateUserInput = {
  username?: string;
  email?: string;
  password?: string;
  fullName?: string | null;
  role?: UserRole;
  isActive?: boolean;
};

export type LoginResult = {
  accessToken: string;
  tokenType: "bearer";
  expiresIn: number;
  user: User;
};

// Categories

export type Category = Timestamped & {
  name: string;
  slug: string;
  description?: string;
  isActive: boolean;
  type: CategoryType;
};

export type CreateCategoryInput = {
  name: string;
  slug?: string;
  description?: string;
  isActive?: boolean;
  type: CategoryType;
};

export type UpdateCategoryInput = Partial<
  Omit<CreateCategoryInput, "description">
> & {
  description?: string | null;
};

// Services

export type Service = Timestamped & {
  name: string;
  description?: string;
  category?: string;
  features: string[];
  icon?: string;
  isActive: boolean;
};

export type CreateServiceInput = {
  name: string;
  description?: string;
  category?: string;
  features?: string[];
  icon?: string;
  isActive?: boolean;
};

export type UpdateServiceInput = {
  name?: string;
  description?: string | null;
  category?: string | null;
  features?: string[];
  icon?: string | null;
  isActive?: boolean;
};

// Projects

export type Project = Timestamped & {
  title: string;
  description?: string;
  category: string;
  stlFile?: string;
  isFeatured: boolean;
  images: string[];
  metadata?: Record<string, unknown>;
  estimatedPrice?: number;
  estimatedDurationHours?: number;
  complexityLevel?: ComplexityLevel;
  priceRangeMin?: number;
  priceRangeMax?: number;
};

export type CreateProjectInput = {
  title: string;
  description?: string;
  category: string;
  isFeatured?: boolean;
  images?: string[];
  metadata?: Record<string, unknown>;
  estimatedPrice?: number;
  estimatedDurationHours?: number;
  complexityLevel?: ComplexityLevel;
  priceRangeMin?: number;
  priceRangeMax?: number;
};

export type UpdateProjectInput = {
  title?: string;
  description?: string | null;
  category?: string;
  stlFile?: string | null;
  isFeatured?: boolean;
  images?: string[];
  metadata?: Record<string, unknown> | null;
  estimatedPrice?: number | null;
  estimatedDurationHours?: number | null;
  complexityLevel?: ComplexityLevel | null;
  priceRangeMin?: number | null;
  priceRangeMax?: number | null;
};

export type ListProjectsParams = {
  page: number;
  perPage: number;
  category?: string;
  isFeatured?: boolean;
  search?: string;
  complexityLevels?: ComplexityLevel[];
  minPrice?: number;
  maxPrice?: number;
  minHours?: number;
  maxHours?: number;
};

export type PagePagination = {
  page: number;
  perPage: number;
  total: number;
  pages: number;
  hasNext: boolean;
  hasPrev: boolean;
};

export type PagedResult<T> = {
  data: T[];
  pagination: PagePagination;
};

// Orders

export type OrderFile = Timestamped & {
  orderId: string;
  filePath: string;
  originalFilename: string;
  fileSize?: number;
  fileType?: string;
};

export type Order = Timestamped & {
  customerName: string;
  customerEmail: string;
  customerPhone?: string;
  customerContact?: string;
  alternativeContact?: string;
  serviceId: string;
  customerId?: string;
  specifications?: Record<string, unknown>;
  status: OrderStatus;
  totalPrice?: number;
  source: OrderSource;
  notes?: string;
  deliveryNeeded?: string;
  deliveryDetails?: string;
  // Flattened from specifications
  color?: string;
  material?: string;
  quantity: number;
  infill?: unknown;
  quality?: string;
  urgency?: string;
};

export type OrderWithFiles = Order & { files: OrderFile[] };

export type CreateOrderInput = {
  customerName: string;
  customerEmail?: string;
  customerPhone?: string;
  customerContact?: string;
  alternativeContact?: string;
  serviceId: string;
  customerId?: string;
  specifications?: Record<string, unknown>;
  source: OrderSource;
  notes?: string;
  deliveryNeeded?: string;
  deliveryDetails?: string;
};

export type UpdateOrderInput = {
  status?: OrderStatus;
  totalPrice?: number | null;
  notes?: string | null;
  specifications?: Record<string, unknown> | null;
};

export type OrderStatusChangeInput = {
  orderId: string;
  newStatus: OrderStatus;
  userId?: string;
};

export type OrderStatusChange = OrderStatusChangeInput & {
  notified: boolean;
};

export type CreateOrderFileInput = {
  orderId: string;
  filePath: string;
  originalFilename: string;
  fileSize?: number;
  fileType?: string;
};

// Articles

export type Article = Timestamped & {
  title: string;
  slug: string;
  content: string;
  excerpt?: string;
  featuredImage?: string;
  category: string;
  tags: string[];
  status: ArticleStatus;
  isPublished: boolean;
  publishedAt?: number;
  views: number;
};

export type CreateArticleInput = {
  title: string;
  slug?: string;
  content: string;
  excerpt?: string;
  featuredImage?: string;
  category: string;
  tags?: string[];
  status?: ArticleStatus;
};

export type UpdateArticleInput = {
  title?: string;
  slug?: string;
  content?: string;
  excerpt?: string | null;
  featuredImage?: string | null;
  category?: string;
  tags?: string[];
  status?: ArticleStatus;
};

// Colors

export type GradientStop = {
  color: string;
  position: number;
};

type ColorCommon = Timestamped & {
  name: string;
  isActive: boolean;
  isNew: boolean;
  sortOrder: number;
  priceModifier: number;
};

export type SolidColor = ColorCommon & {
  type: "solid";
  hexCode: string;
};

export type GradientColor = ColorCommon & {
  type: "gradient";
  gradientColors: GradientStop[];
  gradientDirection: "linear" | "radial";
};

export type MetallicColor = ColorCommon & {
  type: "metallic";
  metallicBase: string;
  metallicIntensity: number;
};

export type Color = SolidColor | GradientColor | MetallicColor;

export type ColorInput = {
  name?: string;
  type?: ColorType;
  isActive?: boolean;
  isNew?: boolean;
  sortOrder?: number;
  priceModifier?: number;
  hexCode?: string | null;
  gradientColors?: GradientStop[] | null;
  gradientDirection?: "linear" | "radial" | null;
  metallicBase?: string | null;
  metallicIntensity?: number | null;
};

// Reviews

export type ReviewImage = {
  url: string;
  caption?: string;
};

export type Review = Timestamped & {
  customerName: string;
  customerEmail: string;
  rating: number;
  title?: string;
  content: string;
  images: ReviewImage[];
  isApproved: boolean;
  isFeatured: boolean;
};

export type CreateReviewInput = {
  customerName: string;
  customerEmail: string;
  rating: number;
  title?: string;
  content: string;
  images?: ReviewImage[];
};

export type UpdateReviewInput = {
  rating?: number;
  title?: string | null;
  content?: string;
  images?: ReviewImage[];
  isApproved?: boolean;
  isFeatured?: boolean;
};

export type ReviewStats = {
  averageRating: number;
  totalReviews: number;
  ratingDistribution: Record<"1" | "2" | "3" | "4" | "5", number>;
};

// Contact requests

export type ContactRequest = Timestamped & {
  name: string;
  email: string;
  phone?: string;
  subject: string;
  message: string;
  status: ContactStatus;
  adminNotes?: string;
};

export type CreateContactRequestInput = {
  name: string;
  email: string;
  phone?: string;
  subject: string;
  message: string;
};

export type UpdateContactRequestInput = {
  name?: string;
  email?: string;
  phone?: string | null;
  subject?: string;
  message?: string;
  status?: ContactStatus;
  adminNotes?: string | null;
};

export type ContactStats = {
  totalRequests: number;
  recentRequests: number;
  statusDistribution: Record<ContactStatus, number>;
};

// CMS

export type ContentBlock = Timestamped & {
  key: string;
  contentType: ContentType;
  content?: string;
  jsonContent?: unknown;
  description?: string;
  groupName?: string;
  isActive: boolean;
  sortOrder: number;
};

export type CreateContentBlockInput = {
  key: string;
  contentType?: ContentType;
  content?: string;
  jsonContent?: unknown;
  description?: string;
  groupName?: string;
  isActive?: boolean;
  sortOrder?: number;
};

export type UpdateContentBlockInput = {
  key?: string;
  contentType?: ContentType;
  content?: string | null;
  jsonContent?: unknown;
  description?: string | null;
  groupName?: string | null;
  isActive?: boolean;
  sortOrder?: number;
};

export type Page = Timestamped & {
  slug: string;
  title: string;
  metaTitle?: string;
  metaDescription?: string;
  content?: Record<string, unknown>;
  pageType: string;
  isActive: boolean;
};

export type CreatePageInput = {
  slug: string;
  title: string;
  metaTitle?: string;
  metaDescription?: string;
  content?: Record<string, unknown>;
  pageType?: string;
  isActive?: boolean;
};

export type UpdatePageInput = {
  slug?: string;
  title?: string;
  metaTitle?: string | null;
  metaDescription?: string | null;
  content?: Record<string, unknown> | null;
  pageType?: string;
  isActive?: boolean;
};

// Site settings

export type SiteSetting = Timestamped & {
  key: string;
  value?: string;
  valueType: SettingValueType;
  description?: string;
  category: string;
  isPublic: boolean;
};

export type CreateSiteSettingInput = {
  key: string;
  value?: string;
  valueType?: SettingValueType;
  description?: string;
  category?: string;
  isPublic?: boolean;
};

export type UpdateSiteSettingInput = {
  value?: string | null;
  valueType?: SettingValueType;
  description?: string | null;
  category?: string;
  isPublic?: boolean;
};

// Files

export type FileValidation = {
  filename: string;
  valid: boolean;
  errors: string[];
  extension: string;
  category: FileCategory;
  contentType: string;
};

export type FileUsage = {
  count: number;
  sizeBytes: number;
};

export type StorageStats = {
  totalFiles: number;
  totalSizeBytes: number;
  byCategory: Partial<Record<FileCategory, FileUsage>>;
  // Keyed by the first segment of the storage key
  byFolder: Record<string, FileUsage>;
};

export type CleanupStats = {
  checked: number;
  deleted: number;
  bytesFreed: number;
  errors: number;
};

export type FullCleanupResult = {
  orphaned: CleanupStats;
  temp: CleanupStats;
  totals: { deleted: number; bytesFreed: number };
};

// Shared

export type Pagination = {
  total: number;
  limit: number;
  offset: number;
};

export type PaginatedResult<T> = {
  data: T[];
  pagination: Pagination;
};

export type ListParams = {
  limit?: number;
  offset?: number;
};
