// src/utils/ids.ts
/** Request correlation id: reuse a sane inbound x-request-id, otherwise mint one. */

import { randomUUID } from "node:crypto";

import type { RequestHandler } from "express";

const INBOUND_ID = /^[A-Za-z0-9._-]{8,64}$/;

export const requestId: RequestHandler = (req, res, next) => {
  const inbound = req.get("x-request-id");
  const id = inbound && INBOUND_ID.test(inbound) ? inbound : randomUUID();
  // store on res.locals to avoid extending Request types
  res.locals.requestId = id;
  res.setHeader("x-request-id", id);
  next();
};
