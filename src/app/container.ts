import { redis } from "@/config/redis";
import type { SessionLookup } from "@/middlewares/authMiddleware";
import { mongoAdminStore } from "./modules/admin/admin.store";
import { createAdminService } from "./modules/admin/admin.service";
import { mongoBlockedEmailStore } from "./modules/blocked-email/blocked-email.store";
import { createBlockedEmailService } from "./modules/blocked-email/blocked-email.service";
import { createDashboardService } from "./modules/dashboard/dashboard.service";
import { mongoFaqStore } from "./modules/faq/faq.store";
import { createFaqService } from "./modules/faq/faq.service";
import { createEmailNotifier } from "./modules/query/query.notifier";
import { mongoQueryStore } from "./modules/query/query.store";
import { createQueryService } from "./modules/query/query.service";
import { mongoStudentStore } from "./modules/student/student.store";
import { createStudentService } from "./modules/student/student.service";

export const faqService = createFaqService({ faqs: mongoFaqStore, queries: mongoQueryStore });

export const queryService = createQueryService({
  queries: mongoQueryStore,
  faq: faqService,
  students: mongoStudentStore,
  blockedEmails: mongoBlockedEmailStore,
  cache: redis,
  notifier: createEmailNotifier(),
});

export const dashboardService = createDashboardService({ queries: mongoQueryStore, cache: redis });

export const adminService = createAdminService({ admins: mongoAdminStore });

export const studentService = createStudentService({ students: mongoStudentStore });

export const blockedEmailService = createBlockedEmailService({ blockedEmails: mongoBlockedEmailStore });

export const sessionLookup: SessionLookup = {
  isActive: (user) => (user.role === "admin" ? adminService.isActive(user.id) : studentService.isActive(user.id)),
};
