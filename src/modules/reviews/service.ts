// src/modules/reviews/service.ts
import { logger } from "../../config/logger.js";
import type { Container } from "../../container.js";
import { ForbiddenError, ValidationError } from "../../domain/errors.js";
import type { Actor } from "../../middlewares/auth.js";
import { isReviewable } from "../bookings/service.js";

/** Rating shown for a vehicle nobody has reviewed yet. */
export const DEFAULT_RATING = 4.0;

export type ReviewInput = {
  bookingId: string;
  rating: number;
  comment?: string | null;
};

/** Mean of the ratings, one decimal. */
export function averageRating(ratings: number[]): number {
  if (ratings.length === 0) return DEFAULT_RATING;
  const mean = ratings.reduce((sum, r) => sum + r, 0) / ratings.length;
  return Math.round(mean * 10) / 10;
}

export function createReviewService(deps: Pick<Container, "store" | "clock">) {
  const { store, clock } = deps;

  async function submitReview(actor: Actor, input: ReviewInput) {
    if (!Number.isFinite(input.rating) || input.rating < 1 || input.rating > 5) {
      throw new ValidationError("Rating must be between 1 and 5.", { rating: input.rating });
    }

    const result = await store.transaction(async (tx) => {
      const booking = await tx.bookings.findById(input.bookingId);
      const existing = booking ? await tx.reviews.findByBooking(booking.id) : null;
      if (
        !booking ||
        booking.customerId !== actor.userId ||
        !isReviewable(booking, existing !== null, clock.now())
      ) {
        throw new ForbiddenError("Booking not found or not eligible for review.", "NOT_REVIEWABLE");
      }

      const review = await tx.reviews.create({
        bookingId: booking.id,
        userId: actor.userId,
        vehicleId: booking.vehicleId,
        rating: input.rating,
        comment: input.comment?.trim() || null,
      });
      const rating = averageRating(await tx.reviews.ratingsForVehicle(booking.vehicleId));
      await tx.vehicles.setRating(booking.vehicleId, rating);
      return { review, vehicleRating: rating };
    });

    logger.info("reviews.submitted", {
      reviewId: result.review.id,
      bookingId: result.review.bookingId,
      vehicleId: result.review.vehicleId,
      rating: result.review.rating,
      vehicleRating: result.vehicleRating,
    });
    return result;
  }

  return { submitReview };
}

export type ReviewService = ReturnType<typeof createReviewService>;
