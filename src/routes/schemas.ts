import { Type } from '@sinclair/typebox';

/** Matches `formatErrorResponse` in utils/errors */
export const ErrorResponseSchema = Type.Object({
  success: Type.Literal(false),
  error: Type.Object({
    message: Type.String(),
    code: Type.String(),
    statusCode: Type.Number(),
    details: Type.Optional(Type.Unknown()),
    timestamp: Type.String(),
    path: Type.Optional(Type.String()),
    requestId: Type.Optional(Type.String()),
  }),
});
