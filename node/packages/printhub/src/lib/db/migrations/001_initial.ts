import type { Knex } from "knex";

function timestamps(table: Knex.CreateTableBuilder): void {
  table.bigInteger("created_at").notNullable();
  table.bigInteger("updated_at").notNullable();
}

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable("user", (table) => {
    table.string("id", 36).primary();
    table.string("username", 50).notNullable().unique();
    table.string("email", 100).notNullable().unique();
    table.string("hashed_password", 255).notNullable();
    table.string("full_name", 100).nullable();
    table.boolean("is_active").notNullable().defaultTo(true);
    table.string("role", 20).notNullable().defaultTo("user");
    table.bigInteger("last_login").nullable();
    timestamps(table);
  });

  await knex.schema.createTable("category", (table) => {
    table.string("id", 36).primary();
    table.string("name", 100).notNullable().unique();
    table.string("slug", 100).notNullable().unique();
    table.text("description").nullable();
    table.boolean("is_active").notNullable().defaultTo(true);
    table.string("type", 20).notNullable();
    timestamps(table);
    table.index(["type"]);
  });

  await knex.schema.createTable("service", (table) => {
    table.string("id", 36).primary();
    table.string("name", 100).notNullable();
    table.text("description").nullable();
    table.string("category", 50).nullable();
    table.text("features").nullable();
    table.string("icon", 50).nullable().defaultTo("cube");
    table.boolean("is_active").notNullable().defaultTo(true);
    timestamps(table);
  });

  await knex.schema.createTable("project", (table) => {
    table.string("id", 36).primary();
    table.string("title", 200).notNullable();
    table.text("description").nullable();
    table.string("category", 50).notNullable();
    table.string("stl_file", 255).nullable();
    table.boolean("is_featured").notNullable().defaultTo(false);
    table.text("images").nullable();
    table.text("metadata").nullable();
    table.decimal("estimated_price", 10, 2).nullable();
    table.integer("estimated_duration_hours").nullable();
    table.string("complexity_level", 20).nullable();
    table.decimal("price_range_min", 10, 2).nullable();
    table.decimal("price_range_max", 10, 2).nullable();
    timestamps(table);
    table.index(["category"]);
    table.index(["is_featured"]);
  });

  await knex.schema.createTable("order", (table) => {
    table.string("id", 36).primary();
    table.string("customer_name", 100).notNullable();
    table.string("customer_email", 200).notNullable();
    table.string("customer_phone", 50).nullable();
    table.string("customer_contact", 200).nullable();
    table.string("alternative_contact", 200).nullable();
    table
      .string("service_id", 36)
      .notNullable()
      .references("id")
      .inTable("service");
    table
      .string("customer_id", 36)
      .nullable()
      .references("id")
      .inTable("user")
      .onDelete("SET NULL");
    table.text("specifications").nullable();
    table.string("status", 20).notNullable().defaultTo("new");
    table.decimal("total_price", 10, 2).nullable();
    table.string("source", 20).notNullable();
    table.text("notes").nullable();
    table.string("delivery_needed", 10).nullable();
    table.text("delivery_details").nullable();
    timestamps(table);
    table.index(["status"]);
    table.index(["customer_email"]);
  });

  await knex.schema.createTable("order_file", (table) => {
    table.string("id", 36).primary();
    table
      .string("order_id", 36)
      .notNullable()
      .references("id")
      .inTable("order")
      .onDelete("CASCADE");
    table.string("file_path", 255).notNullable();
    table.string("original_filename", 255).notNullable();
    table.integer("file_size").nullable();
    table.string("file_type", 50).nullable();
    timestamps(table);
  });

  await knex.schema.createTable("article", (table) => {
    table.string("id", 36).primary();
    table.string("title", 200).notNullable();
    table.string("slug", 255).notNullable().unique();
    table.text("content").notNullable();
    table.text("excerpt").nullable();
    table.string("featured_image", 255).nullable();
    table.string("category", 50).notNullable();
    table.text("tags").nullable();
    table.string("status", 20).notNullable().defaultTo("draft");
    table.boolean("is_published").notNullable().defaultTo(false);
    table.bigInteger("published_at").nullable();
    table.integer("views").notNullable().defaultTo(0);
    timestamps(table);
  });

  await knex.schema.createTable("color", (table) => {
    table.string("id", 36).primary();
    table.string("name", 100).notNullable();
    table.string("type", 20).notNullable().defaultTo("solid");
    table.string("hex_code", 7).nullable();
    table.text("gradient_colors").nullable();
    table.string("gradient_direction", 20).nullable();
    table.string("metallic_base", 7).nullable();
    table.float("metallic_intensity").nullable();
    table.boolean("is_active").notNullable().defaultTo(true);
    table.boolean("is_new").notNullable().defaultTo(false);
    table.integer("sort_order").notNullable().defaultTo(0);
    table.float("price_modifier").notNullable().defaultTo(1);
    timestamps(table);
    table.index(["name"]);
  });

  await knex.schema.createTable("review", (table) => {
    table.string("id", 36).primary();
    table.string("customer_name", 100).notNullable();
    table.string("customer_email", 200).notNullable();
    table.integer("rating").notNullable();
    table.string("title", 200).nullable();
    table.text("content").notNullable();
    table.text("images").nullable();
    table.boolean("is_approved").notNullable().defaultTo(false);
    table.boolean("is_featured").notNullable().defaultTo(false);
    timestamps(table);
  });

  await knex.schema.createTable("contact_request", (table) => {
    table.string("id", 36).primary();
    table.string("name", 100).notNullable();
    table.string("email", 200).notNullable();
    table.string("phone", 20).nullable();
    table.string("subject", 200).notNullable();
    table.text("message").notNullable();
    table.string("status", 20).notNullable().defaultTo("new");
    table.text("admin_notes").nullable();
    timestamps(table);
    table.index(["status"]);
  });

  await knex.schema.createTable("content_block", (table) => {
    table.string("id", 36).primary();
    table.string("key", 255).notNullable().unique();
    table.string("content_type", 20).notNullable().defaultTo("text");
    table.text("content").nullable();
    table.text("json_content").nullable();
    table.string("description", 500).nullable();
    table.string("group_name", 100).nullable();
    table.boolean("is_active").notNullable().defaultTo(true);
    table.integer("sort_order").notNullable().defaultTo(0);
    timestamps(table);
    table.index(["group_name"]);
  });

  await knex.schema.createTable("page", (table) => {
    table.string("id", 36).primary();
    table.string("slug", 255).notNullable().unique();
    table.string("title", 255).notNullable();
    table.string("meta_title", 255).nullable();
    table.text("meta_description").nullable();
    table.text("content").nullable();
    table.string("page_type", 50).notNullable().defaultTo("custom");
    table.boolean("is_active").notNullable().defaultTo(true);
    timestamps(table);
  });

  await knex.schema.createTable("site_setting", (table) => {
    table.string("id", 36).primary();
    table.string("key", 100).notNullable().unique();
    table.text("value").nullable();
    table.string("value_type", 20).notNullable().defaultTo("text");
    table.text("description").nullable();
    table.string("category", 50).notNullable().defaultTo("general");
    table.boolean("is_public").notNullable().defaultTo(true);
    timestamps(table);
  });
}

export async function down(knex: Knex): Promise<void> {
  for (const table of [
    "site_setting",
    "page",
    "content_block",
    "contact_request",
    "review",
    "color",
    "article",
    "order_file",
    "order",
    "project",
    "service",
    "category",
    "user",
  ]) {
    await knex.schema.dropTableIfExists(table);
  }
}
