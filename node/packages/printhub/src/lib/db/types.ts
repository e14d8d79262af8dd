/**
 * Database row types (exact table columns, snake_case).
 *
 * SQLite hands booleans back as 0/1 and PostgreSQL as true/false, so
 * boolean columns are typed as both. JSON columns are stored as text.
 */

export type DbBoolean = boolean | number;

export type UserRole = "user" | "admin";
export type CategoryType = "article" | "project" | "service";
export type ComplexityLevel = "simple" | "medium" | "complex";
export type OrderStatus = "new" | "in_progress" | "completed" | "cancelled";
export type OrderSource = "web" | "telegram";
export type ArticleStatus = "draft" | "published";
export type ColorType = "solid" | "gradient" | "metallic";
export type ContactStatus = "new" | "in_progress" | "resolved" | "closed";
export type ContentType = "text" | "html" | "json";
export type SettingValueType = "text" | "json" | "boolean" | "number";

type Timestamps = {
  created_at: number;
  updated_at: number;
};

export type UserDbRow = Timestamps & {
  id: string;
  username: string;
  email: string;
  hashed_password: string;
  full_name: string | null;
  is_active: DbBoolean;
  role: UserRole;
  last_login: number | null;
};

export type CategoryDbRow = Timestamps & {
  id: string;
  name: string;
  slug: string;
  description: string | null;
  is_active: DbBoolean;
  type: CategoryType;
};

export type ServiceDbRow = Timestamps & {
  id: string;
  name: string;
  description: string | null;
  category: string | null;
  features: string | null;
  icon: string | null;
  is_active: DbBoolean;
};

export type ProjectDbRow = Timestamps & {
  id: string;
  title: string;
  description: string | null;
  category: string;
  stl_file: string | null;
  is_featured: DbBoolean;
  images: string | null;
  metadata: string | null;
  estimated_price: number | null;
  estimated_duration_hours: number | null;
  complexity_level: ComplexityLevel | null;
  price_range_min: number | null;
  price_range_max: number | null;
};

export type OrderDbRow = Timestamps & {
  id: string;
  customer_name: string;
  customer_email: string;
  customer_phone: string | null;
  customer_contact: string | null;
  alternative_contact: string | null;
  service_id: string;
  customer_id: string | null;
  specifications: string | null;
  status: OrderStatus;
  total_price: number | null;
  source: OrderSource;
  notes: string | null;
  delivery_needed: string | null;
  delivery_details: string | null;
};

export type OrderFileDbRow = Timestamps & {
  id: string;
  order_id: string;
  file_path: string;
  original_filename: string;
  file_size: number | null;
  file_type: string | null;
};

export type ArticleDbRow = Timestamps & {
  id: string;
  title: string;
  slug: string;
  content: string;
  excerpt: string | null;
  featured_image: string | null;
  category: string;
  tags: string | null;
  status: ArticleStatus;
  is_published: DbBoolean;
  published_at: number | null;
  views: number;
};

export type ColorDbRow = Timestamps & {
  id: string;
  name: string;
  type: ColorType;
  hex_code: string | null;
  gradient_colors: string | null;
  gradient_direction: string | null;
  metallic_base: string | null;
  metallic_intensity: number | null;
  is_active: DbBoolean;
  is_new: DbBoolean;
  sort_order: number;
  price_modifier: number;
};

export type ReviewDbRow = Timestamps & {
  id: string;
  customer_name: string;
  customer_email: string;
  rating: number;
  title: string | null;
  content: string;
  images: string | null;
  is_approved: DbBoolean;
  is_featured: DbBoolean;
};

export type ContactRequestDbRow = Timestamps & {
  id: string;
  name: string;
  email: string;
  phone: string | null;
  subject: string;
  message: string;
  status: ContactStatus;
  admin_notes: string | null;
};

export type ContentBlockDbRow = Timestamps & {
  id: string;
  key: string;
  content_type: ContentType;
  content: string | null;
  json_content: string | null;
  description: string | null;
  group_name: string | null;
  is_active: DbBoolean;
  sort_order: number;
};

export type PageDbRow = Timestamps & {
  id: string;
  slug: string;
  title: string;
  meta_title: string | null;
  meta_description: string | null;
  content: string | null;
  page_type: string;
  is_active: DbBoolean;
};

export type SiteSettingDbRow = Timestamps & {
  id: string;
  key: string;
  value: string | null;
  value_type: SettingValueType;
  description: string | null;
  category: string;
  is_public: DbBoolean;
};
