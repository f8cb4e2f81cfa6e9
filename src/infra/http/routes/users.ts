import { Router } from 'express';
import { z } from 'zod';
import { AuthGate } from '../../../domain/auth/authGate.js';
import { TokenService } from '../../../domain/auth/token.js';
import { UserProfile } from '../../../domain/auth/user.js';
import { CreateUserUseCase } from '../../../application/users/createUser.js';
import { LoginUseCase } from '../../../application/users/login.js';
import { DeleteUserUseCase } from '../../../application/users/deleteUser.js';
import { UpdateUserUseCase } from '../../../application/users/updateUser.js';
import { UserQueries } from '../../../application/users/queries.js';
import { UserStore } from '../../../application/users/userStore.js';
import { validate } from '../middleware/validate.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { success } from '../envelope.js';

/**
 * @openapi
 * /create/user:
 *   post:
 *     tags: [Users]
 *     summary: Register a new user
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [email, password, handle, public_key]
 *             properties:
 *               email: { type: string, format: email }
 *               password: { type: string }
 *               handle: { type: string }
 *               public_key: { type: string }
 *     responses:
 *       201:
 *         description: User created (password hash omitted)
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/UserEnvelope' }
 *       400:
 *         description: Validation error
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/Envelope' }
 *       409:
 *         description: Email already registered
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/Envelope' }
 *
 * /login/{email}:
 *   post:
 *     tags: [Auth]
 *     summary: Exchange a password for a session token
 *     parameters:
 *       - { in: path, name: email, required: true, schema: { type: string } }
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [password]
 *             properties:
 *               password: { type: string }
 *     responses:
 *       200:
 *         description: Token issued; data holds the token string
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/Envelope' }
 *       401:
 *         description: Password is incorrect (Failure)
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/Envelope' }
 *       404:
 *         description: No such user (Failure)
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/Envelope' }
 *
 * /user/delete/{email}/{token}:
 *   delete:
 *     tags: [Users]
 *     summary: Delete an account
 *     parameters:
 *       - { in: path, name: email, required: true, schema: { type: string } }
 *       - { in: path, name: token, required: true, schema: { type: string } }
 *     responses:
 *       200: { description: Deleted }
 *       401:
 *         description: Token rejected (Error)
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/Envelope' }
 *       404:
 *         description: No such user (Failure)
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/Envelope' }
 *
 * /update/user/{email}/{token}:
 *   put:
 *     tags: [Users]
 *     summary: Update profile fields or password
 *     parameters:
 *       - { in: path, name: email, required: true, schema: { type: string } }
 *       - { in: path, name: token, required: true, schema: { type: string } }
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             properties:
 *               password: { type: string }
 *               handle: { type: string }
 *               public_key: { type: string }
 *               bio: { type: string, nullable: true }
 *     responses:
 *       200:
 *         description: Updated user
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/UserEnvelope' }
 *       401:
 *         description: Token rejected (Error)
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/Envelope' }
 *       404:
 *         description: No such user (Failure)
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/Envelope' }
 *
 * /user/{email}:
 *   get:
 *     tags: [Directory]
 *     summary: Look up a user
 *     parameters:
 *       - { in: path, name: email, required: true, schema: { type: string } }
 *     responses:
 *       200:
 *         description: User profile
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/UserEnvelope' }
 *       404:
 *         description: No such user (Failure)
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/Envelope' }
 *
 * /list/users:
 *   get:
 *     tags: [Directory]
 *     summary: List every registered email
 *     responses:
 *       200: { description: OK }
 */

// Lookups accept any key: an unknown one is a Failure, not a validation Error
const emailParamsSchema = z.object({
  email: z.string().min(1),
});

const tokenParamsSchema = emailParamsSchema.extend({
  token: z.string().min(1),
});

const createUserBodySchema = z.object({
  email: z.string().email(),
  password: z.string().min(1),
  handle: z.string().min(1),
  public_key: z.string(),
});

const loginBodySchema = z.object({
  password: z.string().min(1),
});

const updateUserBodySchema = z
  .object({
    password: z.string().min(1).optional(),
    handle: z.string().min(1).optional(),
    public_key: z.string().optional(),
    bio: z.string().nullable().optional(),
  })
  .strict();

export interface UserJson {
  email: string;
  handle: string;
  public_key: string;
  bio: string | null;
}

export function toUserJson(profile: UserProfile): UserJson {
  return {
    email: profile.email,
    handle: profile.handle,
    public_key: profile.publicKey,
    bio: profile.bio,
  };
}

export interface UserRouteDeps {
  userStore: UserStore;
  tokenService: TokenService;
}

export function createUserRoutes({ userStore, tokenService }: UserRouteDeps) {
  const router = Router();
  const authGate = new AuthGate(tokenService);
  const createUserUseCase = new CreateUserUseCase(userStore);
  const loginUseCase = new LoginUseCase(userStore, tokenService);
  const deleteUserUseCase = new DeleteUserUseCase(userStore, authGate);
  const updateUserUseCase = new UpdateUserUseCase(userStore, authGate);
  const queries = new UserQueries(userStore);

  router.post(
    '/create/user',
    validate({ body: createUserBodySchema }),
    asyncHandler(async (req, res) => {
      const body = createUserBodySchema.parse(req.body);
      const profile = await createUserUseCase.execute({
        email: body.email,
        password: body.password,
        handle: body.handle,
        publicKey: body.public_key,
      });
      res.status(201).json(success(toUserJson(profile)));
    })
  );

  router.post(
    '/login/:email',
    validate({ params: emailParamsSchema, body: loginBodySchema }),
    asyncHandler(async (req, res) => {
      const { email } = emailParamsSchema.parse(req.params);
      const { password } = loginBodySchema.parse(req.body);
      const token = await loginUseCase.execute({ email, password });
      res.status(200).json(success(token));
    })
  );

  router.delete(
    '/user/delete/:email/:token',
    validate({ params: tokenParamsSchema }),
    asyncHandler(async (req, res) => {
      const { email, token } = tokenParamsSchema.parse(req.params);
      await deleteUserUseCase.execute({ email, token });
      res.status(200).json(success(`Successfully deleted ${email}`));
    })
  );

  router.put(
    '/update/user/:email/:token',
    validate({ params: tokenParamsSchema, body: updateUserBodySchema }),
    asyncHandler(async (req, res) => {
      const { email, token } = tokenParamsSchema.parse(req.params);
      const body = updateUserBodySchema.parse(req.body);
      const profile = await updateUserUseCase.execute({
        email,
        token,
        changes: {
          password: body.password,
          handle: body.handle,
          publicKey: body.public_key,
          bio: body.bio,
        },
      });
      res.status(200).json(success(toUserJson(profile)));
    })
  );

  router.get(
    '/user/:email',
    validate({ params: emailParamsSchema }),
    asyncHandler(async (req, res) => {
      const { email } = emailParamsSchema.parse(req.params);
      const profile = await queries.getUser(email);
      res.status(200).json(success(toUserJson(profile)));
    })
  );

  router.get(
    '/list/users',
    asyncHandler(async (_req, res) => {
      const emails = await queries.listEmails();
      res.status(200).json(success(emails));
    })
  );

  return router;
}
