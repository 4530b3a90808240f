// ─────────────────────────────────────────────────────────────
// Auth Commands — register, login, logout
//
// The gate decides whether these may run at all. register then
// applies its own rules:
//   • a second admin is refused, whoever asks
//   • logged-out users may only create student accounts
//     (unless admin bootstrap is enabled and no admin exists)
// ─────────────────────────────────────────────────────────────

import { isRole, ROLES } from "../schema/accessSchema";
import { DocCliError } from "../access/accessErrors";
import { hashPassword, verifyPassword } from "../registry/credentialStore";
import type { CommandHandler } from "../cli/commandContext";
import { expectPositionals } from "../cli/argParser";

export const register: CommandHandler = async (ctx, args) => {
  const [name, email, roleArg] = expectPositionals(args, "register <name> <email> <role>", 3);
  const role = roleArg.toLowerCase();
  if (!isRole(role)) {
    throw new DocCliError("InvalidArguments", `Invalid role "${roleArg}". Choose from ${ROLES.join(", ")}.`);
  }

  if (role === "admin" && ctx.credentials.countByRole("admin") > 0) {
    throw new DocCliError("AdminAlreadyExists", "An admin already exists. Cannot register another admin.");
  }

  if (ctx.session.status === "logged-out" && role !== "student") {
    const bootstrap = role === "admin" && ctx.config.allowAdminBootstrap;
    if (!bootstrap) {
      throw new DocCliError(
        "AdminOnlyRole",
        `Only an admin can register ${role} accounts. Self-registration is limited to students.`
      );
    }
  }

  const password = await ctx.prompt.ask("Password: ");
  const confirm = await ctx.prompt.ask("Confirm Password: ");
  if (password !== confirm) {
    throw new DocCliError("PasswordMismatch", "Passwords do not match.");
  }
  if (password.length === 0) {
    throw new DocCliError("InvalidArguments", "Password cannot be empty.");
  }

  const result = ctx.credentials.createUser(name, email, role, hashPassword(password));
  if ("error" in result) {
    throw new DocCliError("DuplicateEmail", "Error: email already registered.");
  }
  ctx.out.info(`User ${name} (${role}) registered.`);
};

export const login: CommandHandler = async (ctx, args) => {
  const [email] = expectPositionals(args, "login <email>", 1);

  const user = ctx.credentials.findByEmail(email);
  if (!user) {
    throw new DocCliError("UserNotFound", "User not found.");
  }

  const password = await ctx.prompt.ask("Password: ");
  if (!verifyPassword(password, user.passwordHash)) {
    throw new DocCliError("InvalidCredentials", "Invalid password.");
  }

  ctx.sessionStore.write({ userId: user.id, name: user.name, email: user.email, role: user.role });
  ctx.out.info(`Logged in as ${user.name} (${user.role}).`);
};

export const logout: CommandHandler = async (ctx, args) => {
  expectPositionals(args, "logout", 0);
  ctx.out.info(ctx.sessionStore.clear() ? "Logged out." : "Not logged in.");
};
