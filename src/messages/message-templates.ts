/**
 * Outbound chat texts (Telegram Markdown, Vietnamese).
 */

import { formatLocalDate } from '../common/local-time.js';
import type { ApprovedPlan, PendingPlan } from '../types/plan.types.js';

// ────────────────────────────────────────────
// Commands
// ────────────────────────────────────────────

export const START_TEXT = `👋 *Xin chào! Tôi là AI Planning Assistant!*

Tôi có thể giúp bạn:
✅ Tạo kế hoạch tuần tự động
✅ Nhắc nhở các mục tiêu hàng ngày
✅ Tìm kiếm tài liệu và ghi chú
✅ Theo dõi tiến độ công việc

*Cách sử dụng:*
Gửi mục tiêu của bạn cho tôi, ví dụ:
"Tôi muốn học Python trong 2 tuần"

Hoặc dùng các lệnh:
/help - Xem hướng dẫn chi tiết
/plan - Xem kế hoạch hiện tại`;

export const HELP_TEXT = `📖 *Hướng Dẫn Sử Dụng*

*1️⃣ Tạo Kế Hoạch:*
Gửi mục tiêu của bạn, ví dụ:
- "Tôi muốn học Python trong 2 tuần"
- "Giúp tôi tập thể dục đều đặn"

*2️⃣ Tìm Kiếm Tài Liệu:*
Hỏi về bất kỳ chủ đề nào, tôi sẽ tìm trong tài liệu đã lưu.

*3️⃣ Xem Kế Hoạch:*
Gõ /plan để xem kế hoạch hiện tại

*4️⃣ Tự Động Hóa:*
- Kế hoạch tuần mới: Chủ nhật 9h sáng
- Nhắc nhở hàng ngày: 4 lần (6h, 12h, 18h, 21h)
- Databases được làm mới tự động

Hãy bắt đầu bằng cách gửi mục tiêu của bạn! 🚀`;

export const NO_PLANS_TEXT = `📋 *Bạn chưa có kế hoạch nào*

Hãy gửi mục tiêu của bạn để tôi tạo kế hoạch!

Ví dụ:
- "Tôi muốn học lập trình"
- "Giúp tôi giảm cân trong 1 tháng"
- "Làm sao để cải thiện tiếng Anh?"`;

export const PLAN_FETCH_ERROR_TEXT = 'Xin lỗi, có lỗi khi lấy kế hoạch. Vui lòng thử lại.';

export const UNKNOWN_COMMAND_TEXT = `❓ *Lệnh không hợp lệ*

Các lệnh có sẵn:
/start - Bắt đầu
/help - Hướng dẫn
/plan - Xem kế hoạch

Hoặc gửi tin nhắn bình thường để chat với tôi!`;

export const AI_APOLOGY_TEXT = 'Xin lỗi, tôi đang gặp sự cố kỹ thuật. Vui lòng thử lại sau.';

export const GENERIC_ERROR_TEXT = 'Xin lỗi, có lỗi xảy ra. Vui lòng thử lại sau.';

/** /plan listing, newest first. */
export function renderApprovedPlanList(plans: ApprovedPlan[]): string {
  let text = '📋 *Kế Hoạch Của Bạn:*\n\n';
  plans.forEach((plan, i) => {
    const date = plan.createdAt ? formatLocalDate(plan.createdAt) : 'N/A';
    const emoji = plan.status === 'completed' ? '✅' : '🔄';
    text += `${emoji} *${i + 1}. ${plan.goal}*\n`;
    text += `   📅 ${date} | Status: ${plan.status}\n\n`;
  });
  return text;
}

/** Retrieval context handed to the model; "" when nothing matched. */
export function renderDocumentContext(contents: string[]): string {
  return contents.map((c) => `- ${c}`).join('\n\n');
}

// ────────────────────────────────────────────
// Weekly planner
// ────────────────────────────────────────────

export const WEEKLY_NO_PLAN_TEXT = `📅 *Kế Hoạch Tuần Mới*

Chào buổi sáng Chủ nhật! 🌅

Bạn chưa có kế hoạch nào cho tuần này. Hãy gửi mục tiêu của bạn để tôi giúp tạo kế hoạch nhé!

Ví dụ:
- "Tôi muốn học Python cơ bản"
- "Giúp tôi tập thể dục đều đặn"
- "Cải thiện kỹ năng giao tiếp"

Hãy bắt đầu tuần mới với mục tiêu rõ ràng! 💪`;

function numberedGoals(plans: { goal: string }[]): string {
  return plans.map((plan, i) => `${i + 1}. ${plan.goal}\n`).join('');
}

export function renderWeeklyDigest(plans: PendingPlan[]): string {
  return (
    '📋 *Kế Hoạch Tuần Này:*\n\n' +
    numberedGoals(plans) +
    '\n💡 *Gợi ý:*\n' +
    '• Chia nhỏ mục tiêu thành các bước nhỏ\n' +
    '• Làm việc đều đặn mỗi ngày\n' +
    '• Theo dõi tiến độ và điều chỉnh kịp thời\n\n' +
    'Chúc bạn một tuần thành công! 🚀'
  );
}

// ────────────────────────────────────────────
// Daily reminder
// ────────────────────────────────────────────

export const MORNING_NO_PLAN_TEXT = `☀️ *Chào Buổi Sáng!*

Bạn chưa có kế hoạch nào. Hãy bắt đầu ngày mới bằng cách đặt mục tiêu cho mình nhé!

Gửi mục tiêu của bạn để tôi giúp tạo kế hoạch. 💪`;

const GREETINGS_BY_HOUR: Readonly<Record<number, string>> = {
  6: '☀️ *Chào Buổi Sáng!*',
  12: '🌤️ *Nghỉ Trưa Rồi!*',
  18: '🌆 *Buổi Chiều Vui Vẻ!*',
  21: '🌙 *Buổi Tối An Lành!*',
};

export const FALLBACK_GREETING = '⏰ *Nhắc Nhở*';

export function greetingForHour(hour: number): string {
  return GREETINGS_BY_HOUR[hour] ?? FALLBACK_GREETING;
}

export function renderDailyReminder(hour: number, plans: ApprovedPlan[]): string {
  return (
    `${greetingForHour(hour)}\n\n📋 *Kế Hoạch Hôm Nay:*\n\n` +
    numberedGoals(plans) +
    '\n💪 Hãy tiếp tục cố gắng nhé!'
  );
}

// ────────────────────────────────────────────
// Keep-alive
// ────────────────────────────────────────────

export const SYSTEMS_OPERATIONAL_TEXT = `🔄 *Hệ Thống Đang Hoạt Động*

✅ Firestore: Connected
✅ Supabase: Connected
✅ Gemini API: Active

Tất cả dịch vụ đang hoạt động bình thường! 💚`;

export const KEEP_ALIVE_ERROR_MAX_CHARS = 200;

export function renderKeepAliveError(error: string): string {
  return `⚠️ *KeepAlive Error*

Có lỗi xảy ra khi ping databases:
${Array.from(error).slice(0, KEEP_ALIVE_ERROR_MAX_CHARS).join('')}

Vui lòng kiểm tra hệ thống!`;
}
