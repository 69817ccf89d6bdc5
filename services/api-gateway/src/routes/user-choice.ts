import type { UserChoiceCreatedResponse, UserChoiceDetail } from "@shelf-guide/shared";
import type { FastifyInstance } from "fastify";
import { z } from "zod";
import type { ChoiceRecord } from "../domain/models.js";
import type { ShelfStore } from "../domain/store.js";

const toDetail = (choice: ChoiceRecord): UserChoiceDetail => ({
  id: choice.id,
  item_name: choice.itemName,
  item_location: choice.itemLocation,
  processed: choice.processed,
  created_at: choice.createdAt,
});

const flag = z
  .enum(["true", "false", "1", "0"])
  .default("true")
  .transform((value) => value === "true" || value === "1");

export const registerUserChoiceRoutes = (app: FastifyInstance, store: ShelfStore) => {
  app.post("/user-choice", async (request, reply) => {
    const schema = z.object({
      item_name: z.string().trim().min(1),
      item_location: z.string().trim().nullish(),
    });
    const body = schema.parse(request.body);
    const choice = store.createChoice(body.item_name, body.item_location || null);
    console.log(`[api] choice "${choice.itemName}" recorded as ${choice.id}`);
    const response: UserChoiceCreatedResponse = { message: "Choice recorded", id: choice.id };
    return reply.send(response);
  });

  app.get("/user-choice/latest", async (request, reply) => {
    const query = z.object({ unprocessed_only: flag }).parse(request.query);
    const choice = store.latestChoice(query.unprocessed_only);
    return reply.send(choice ? toDetail(choice) : null);
  });

  app.patch("/user-choice/:choiceId/processed", async (request, reply) => {
    const params = z.object({ choiceId: z.string().uuid() }).parse(request.params);
    const choice = store.markChoiceProcessed(params.choiceId);
    if (!choice) return reply.notFound("User choice not found");
    return reply.send({ message: "Choice marked as processed" });
  });
};
