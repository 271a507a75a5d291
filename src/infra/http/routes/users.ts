import { Router } from 'express';
import { z } from 'zod';
import { UserQueries, USER_NOT_FOUND_MESSAGE } from '../../../application/users/queries.js';
import { UpdateUserUseCase } from '../../../application/users/updateUser.js';
import { DeleteUserUseCase } from '../../../application/users/deleteUser.js';
import type { TokenVerifier } from '../../../application/auth/tokens.js';
import { NotFoundError } from '../../../application/errors.js';
import type { UserStore } from '../../../domain/auth/userStore.js';
import { authMiddleware, requireIdentity } from '../middleware/auth.js';
import { validate } from '../middleware/validate.js';
import { asyncHandler } from '../middleware/asyncHandler.js';

/**
 * @openapi
 * /api/v1/users:
 *   get:
 *     tags: [Users]
 *     summary: List all users
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200:
 *         description: Every user, without password data
 *         content:
 *           application/json:
 *             schema:
 *               type: array
 *               items: { $ref: '#/components/schemas/User' }
 *       401:
 *         description: Unauthorized
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /api/v1/users/{id}:
 *   get:
 *     tags: [Users]
 *     summary: Get a user by id
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: integer }
 *     responses:
 *       200:
 *         description: OK
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/User' }
 *       401:
 *         description: Unauthorized
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       404:
 *         description: User not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *   put:
 *     tags: [Users]
 *     summary: Update a user's name and/or email
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: integer }
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             properties:
 *               name: { type: string }
 *               email: { type: string, format: email }
 *     responses:
 *       200:
 *         description: Updated user
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/User' }
 *       400:
 *         description: Validation error or email already registered
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       401:
 *         description: Unauthorized
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       404:
 *         description: User not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *   delete:
 *     tags: [Users]
 *     summary: Permanently delete a user
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: integer }
 *     responses:
 *       200: { description: User deleted }
 *       401:
 *         description: Unauthorized
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       404:
 *         description: User not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /api/v1/profile:
 *   get:
 *     tags: [Profile]
 *     summary: The authenticated caller's own record
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200:
 *         description: OK
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/User' }
 *       401:
 *         description: Unauthorized
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       404:
 *         description: The caller's record no longer exists
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 */

/** Largest value of the INTEGER id column. */
const MAX_USER_ID = 2_147_483_647;

const updateUserBodySchema = z.object({
  name: z.string({ invalid_type_error: 'Name must be a string' }).optional(),
  email: z
    .string({ invalid_type_error: 'Email must be a string' })
    .trim()
    .refine(
      (value) => value === '' || z.string().email().safeParse(value).success,
      'Invalid email address'
    )
    .optional(),
});

/**
 * Path ids parse as base-10 integers, with an optional `+` sign and leading
 * zeros (`01` and `+1` both name user 1). Anything that is not a positive
 * integer in column range cannot name a record, so it is treated as not
 * found rather than as bad input.
 */
function parseUserId(raw: string): number {
  if (/^\+?\d+$/.test(raw)) {
    const id = Number(raw);
    if (id > 0 && id <= MAX_USER_ID) {
      return id;
    }
  }
  throw new NotFoundError(USER_NOT_FOUND_MESSAGE);
}

export interface UserRouteDependencies {
  userStore: UserStore;
  tokenVerifier: TokenVerifier;
}

export function createUserRoutes(deps: UserRouteDependencies) {
  const router = Router();
  const queries = new UserQueries(deps.userStore);
  const updateUserUseCase = new UpdateUserUseCase(deps.userStore);
  const deleteUserUseCase = new DeleteUserUseCase(deps.userStore);

  // Per route rather than router.use, so unknown paths still fall through to 404.
  const requireAuth = authMiddleware(deps.tokenVerifier);

  router.get(
    '/users',
    requireAuth,
    asyncHandler(async (_req, res) => {
      res.json(await queries.listUsers());
    })
  );

  router.get(
    '/users/:id',
    requireAuth,
    asyncHandler(async (req, res) => {
      res.json(await queries.getUser(parseUserId(req.params.id)));
    })
  );

  router.put(
    '/users/:id',
    requireAuth,
    validate({ body: updateUserBodySchema }),
    asyncHandler(async (req, res) => {
      const id = parseUserId(req.params.id);
      const body = updateUserBodySchema.parse(req.body);
      const user = await updateUserUseCase.execute({ id, ...body });
      res.json(user);
    })
  );

  router.delete(
    '/users/:id',
    requireAuth,
    asyncHandler(async (req, res) => {
      await deleteUserUseCase.execute(parseUserId(req.params.id));
      res.json({ message: 'User deleted' });
    })
  );

  router.get(
    '/profile',
    requireAuth,
    asyncHandler(async (req, res) => {
      res.json(await queries.getProfile(requireIdentity(req)));
    })
  );

  return router;
}
