/**
 * Creates a staff account:
 *   tsx scripts/createAdmin.ts <email> <username> <password>
 * or with ADMIN_EMAIL, ADMIN_USERNAME and ADMIN_PASSWORD set.
 */
import { registrationSchema } from '@application/users/userSchemas.ts'
import { zodFieldErrors } from '@application/validation/parseInput.ts'
import { createUser, getUserByEmail, getUserByUsername } from '@infrastructure/db/index.ts'
import { logger } from '@infrastructure/logger.ts'
import { hashPassword } from '@infrastructure/security/passwords.ts'

async function main() {
  const [
    email = process.env.ADMIN_EMAIL,
    username = process.env.ADMIN_USERNAME,
    password = process.env.ADMIN_PASSWORD,
  ] = process.argv.slice(2)

  const parsed = registrationSchema.safeParse({
    email,
    username,
    password,
    first_name: 'Admin',
    last_name: 'Admin',
  })
  if (!parsed.success) {
    logger.error({ errors: zodFieldErrors(parsed.error) }, 'Invalid admin account')
    process.exitCode = 1
    return
  }

  const input = parsed.data
  if ((await getUserByEmail(input.email)) || (await getUserByUsername(input.username))) {
    logger.error({ email: input.email, username: input.username }, 'User already exists')
    process.exitCode = 1
    return
  }

  const user = await createUser({ ...input, password: await hashPassword(input.password), isStaff: true })
  logger.info({ id: user.id, username: user.username }, 'Admin created')
}

main().catch((err: unknown) => {
  logger.error({ err }, 'Creating the admin failed')
  process.exitCode = 1
})
