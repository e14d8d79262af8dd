import { expect } from "chai";
import { loginAsNewAdmin, loginAsNewUser } from "@printhub/test-utils";
import type { PaginatedResult, Review, ReviewStats } from "printhub";
import { client, ctx } from "../test-setup.js";

describe("Reviews API", () => {
  async function submitReview(body: Record<string, unknown>): Promise<Review> {
    const response = await client.post<Review>("/api/v1/reviews", {
      customerName: "Sam",
      customerEmail: "sam@example.com",
      content: "Great print quality",
      ...body,
    });
    expect(response.status).to.equal(201);
    return response.data;
  }

  async function approve(id: string): Promise<void> {
    const response = await client.put(`/api/v1/reviews/admin/${id}/approve`);
    expect(response.status).to.equal(200);
  }

  describe("POST /api/v1/reviews", () => {
    it("should hold new reviews for moderation", async () => {
      const review = await submitReview({ rating: 5, title: "Perfect" });

      expect(review.isApproved).to.equal(false);
      expect(review.isFeatured).to.equal(false);
      expect(review.title).to.equal("Perfect");
      expect(review.images).to.deep.equal([]);

      const hidden = await client.get<{ error: string }>(
        `/api/v1/reviews/${review.id}`,
      );
      expect(hidden.status).to.equal(404);
      expect(hidden.data.error).to.equal("Review not found");
    });

    it("should reject a rating out of range", async () => {
      const response = await client.post("/api/v1/reviews", {
        customerName: "Sam",
        customerEmail: "sam@example.com",
        rating: 6,
        content: "Too good",
      });

      expect(response.status).to.equal(400);
    });

    it("should accept a multipart form with photos", async () => {
      const form = new FormData();
      form.append("customerName", "Kim");
      form.append("customerEmail", "kim@example.com");
      form.append("rating", "4");
      form.append("content", "Nice detail");
      form.append("images", new Blob(["png-bytes"]), "photo.png");

      const response = await client.postForm<Review>("/api/v1/reviews", form);

      expect(response.status).to.equal(201);
      expect(response.data.rating).to.equal(4);
      expect(response.data.images).to.have.lengthOf(1);
      expect(response.data.images[0]?.url).to.match(
        /^\/api\/v1\/files\/raw\/reviews\/[0-9a-f-]{36}-photo\.png$/,
      );
    });

    it("should only accept image photos", async () => {
      const form = new FormData();
      form.append("customerName", "Kim");
      form.append("customerEmail", "kim@example.com");
      form.append("rating", "4");
      form.append("content", "Nice detail");
      form.append("images", new Blob(["solid"]), "model.stl");

      const response = await client.postForm<{ error: string }>(
        "/api/v1/reviews",
        form,
      );

      expect(response.status).to.equal(400);
      expect(response.data.error).to.equal(
        "File type .stl is not allowed. Allowed: .jpg, .jpeg, .png, .gif, .webp",
      );
    });

    it("should not keep photos stored before a rejected one", async () => {
      const before = await ctx().storage.list("reviews");
      const form = new FormData();
      form.append("customerName", "Kim");
      form.append("customerEmail", "kim@example.com");
      form.append("rating", "5");
      form.append("content", "Great");
      form.append("images", new Blob(["png-bytes"]), "first.png");
      form.append("images", new Blob(["solid"]), "second.stl");

      const response = await client.postForm("/api/v1/reviews", form);

      expect(response.status).to.equal(400);
      const after = await ctx().storage.list("reviews");
      expect(after.map((f) => f.key)).to.deep.equal(before.map((f) => f.key));
    });
  });

  describe("moderation", () => {
    it("should require admin", async () => {
      await loginAsNewUser(ctx(), client);

      const response = await client.get("/api/v1/reviews/admin/all");
      expect(response.status).to.equal(403);
    });

    it("should approve, feature and reject", async () => {
      const review = await submitReview({ rating: 5 });
      await loginAsNewAdmin(ctx(), client);

      const pending = await client.get<PaginatedResult<Review>>(
        "/api/v1/reviews/admin/pending",
      );
      expect(pending.data.data.map((r) => r.id)).to.deep.equal([review.id]);

      await approve(review.id);
      const featured = await client.put<Review>(
        `/api/v1/reviews/admin/${review.id}/feature`,
        { featured: true },
      );
      expect(featured.data.isApproved).to.equal(true);
      expect(featured.data.isFeatured).to.equal(true);

      const publicFeatured = await client.get<Review[]>("/api/v1/reviews/featured");
      expect(publicFeatured.data.map((r) => r.id)).to.deep.equal([review.id]);

      const rejected = await client.put<Review>(
        `/api/v1/reviews/admin/${review.id}/reject`,
      );
      expect(rejected.data.isApproved).to.equal(false);
      expect(rejected.data.isFeatured).to.equal(false);
    });

    it("should moderate both flags at once", async () => {
      const review = await submitReview({ rating: 3 });
      await loginAsNewAdmin(ctx(), client);

      const response = await client.put<Review>(
        `/api/v1/reviews/admin/${review.id}/moderate`,
        { isApproved: true, isFeatured: true },
      );

      expect(response.data.isApproved).to.equal(true);
      expect(response.data.isFeatured).to.equal(true);
    });

    it("should edit a review", async () => {
      const review = await submitReview({ rating: 2, title: "Meh" });
      await loginAsNewAdmin(ctx(), client);

      const response = await client.put<Review>(
        `/api/v1/reviews/admin/${review.id}`,
        { rating: 3, title: null },
      );

      expect(response.data.rating).to.equal(3);
      expect(response.data).to.not.have.property("title");
    });

    it("should search and filter all reviews", async () => {
      await submitReview({ rating: 5, customerName: "Jordan" });
      const other = await submitReview({ rating: 4, customerName: "Riley" });
      await loginAsNewAdmin(ctx(), client);
      await approve(other.id);

      const search = await client.get<PaginatedResult<Review>>(
        "/api/v1/reviews/admin/search?q=jordan",
      );
      expect(search.data.data.map((r) => r.customerName)).to.deep.equal(["Jordan"]);

      const approved = await client.get<PaginatedResult<Review>>(
        "/api/v1/reviews/admin/all?approved=true",
      );
      expect(approved.data.data.map((r) => r.customerName)).to.deep.equal([
        "Riley",
      ]);

      const all = await client.get<PaginatedResult<Review>>(
        "/api/v1/reviews/admin/all",
      );
      expect(all.data.pagination.total).to.equal(2);
    });

    it("should show any review to admins", async () => {
      const review = await submitReview({ rating: 1 });
      await loginAsNewAdmin(ctx(), client);

      const response = await client.get<Review>(
        `/api/v1/reviews/admin/${review.id}`,
      );
      expect(response.status).to.equal(200);
      expect(response.data.rating).to.equal(1);
    });

    it("should delete a review", async () => {
      const review = await submitReview({ rating: 1 });
      await loginAsNewAdmin(ctx(), client);

      const deleted = await client.delete(`/api/v1/reviews/admin/${review.id}`);
      expect(deleted.status).to.equal(204);

      const again = await client.delete<{ error: string }>(
        `/api/v1/reviews/admin/${review.id}`,
      );
      expect(again.status).to.equal(404);
      expect(again.data.error).to.equal(`Review not found: ${review.id}`);
    });
  });

  describe("GET /api/v1/reviews/stats", () => {
    it("should summarize approved reviews only", async () => {
      const first = await submitReview({ rating: 5 });
      const second = await submitReview({ rating: 4 });
      const third = await submitReview({ rating: 4 });
      await submitReview({ rating: 1 });

      await loginAsNewAdmin(ctx(), client);
      await approve(first.id);
      await approve(second.id);
      await approve(third.id);
      client.clearToken();

      const response = await client.get<ReviewStats>("/api/v1/reviews/stats");

      expect(response.data).to.deep.equal({
        averageRating: 4.3,
        totalReviews: 3,
        ratingDistribution: { "1": 0, "2": 0, "3": 0, "4": 2, "5": 1 },
      });

      const listed = await client.get<PaginatedResult<Review>>("/api/v1/reviews");
      expect(listed.data.pagination.total).to.equal(3);
    });

    it("should report zero without reviews", async () => {
      const response = await client.get<ReviewStats>("/api/v1/reviews/stats");

      expect(response.data).to.deep.equal({
        averageRating: 0,
        totalReviews: 0,
        ratingDistribution: { "1": 0, "2": 0, "3": 0, "4": 0, "5": 0 },
      });
    });
  });
});
