import { Router } from "express";
import { z } from "zod";

import type { BookingService } from "./service.js";
import { getActor, requireAuth } from "../../middlewares/auth.js";
import { asyncHandler, jsonOk } from "../../utils/http.js";
import type { ReviewService } from "../reviews/service.js";

const ReviewBody = z.object({
  rating: z.coerce.number(),
  comment: z.string().max(2000).nullish(),
});

export function bookingsRouter(bookings: BookingService, reviews: ReviewService) {
  const router = Router();
  router.use(requireAuth);

  /** My bookings, newest first */
  router.get(
    "/",
    asyncHandler(async (req, res) => {
      const items = await bookings.listMyBookings(getActor(req));
      jsonOk(res, { items });
    })
  );

  router.post(
    "/:id/cancel",
    asyncHandler(async (req, res) => {
      const { booking, fee, refundAmount } = await bookings.cancelBooking(getActor(req), req.params.id);
      jsonOk(res, {
        success: true,
        bookingId: booking.id,
        status: booking.status,
        fee,
        refundAmount,
        message:
          fee === 0
            ? `Booking cancelled. Full refund of ${refundAmount} will be processed.`
            : `Booking cancelled. Cancellation fee of ${fee} applied; ${refundAmount} will be refunded.`,
      });
    })
  );

  router.get(
    "/:id/receipt",
    asyncHandler(async (req, res) => {
      jsonOk(res, await bookings.getReceipt(getActor(req), req.params.id));
    })
  );

  router.post(
    "/:id/review",
    asyncHandler(async (req, res) => {
      const body = ReviewBody.parse(req.body);
      const { review, vehicleRating } = await reviews.submitReview(getActor(req), {
        bookingId: req.params.id,
        rating: body.rating,
        comment: body.comment,
      });
      jsonOk(res, { success: true, reviewId: review.id, vehicleRating }, 201);
    })
  );

  return router;
}
