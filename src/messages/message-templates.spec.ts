import {
  FALLBACK_GREETING,
  greetingForHour,
  renderApprovedPlanList,
  renderDailyReminder,
  renderDocumentContext,
  renderKeepAliveError,
  renderWeeklyDigest,
} from './message-templates.js';

describe('renderApprovedPlanList', () => {
  it('tags completed and in-progress plans and formats the local date', () => {
    const text = renderApprovedPlanList([
      { id: 'a', chatId: '1', goal: 'Học Python', status: 'in_progress', createdAt: new Date('2026-03-10T02:00:00Z') },
      { id: 'b', chatId: '1', goal: 'Chạy 5km', status: 'completed', createdAt: null },
    ]);

    expect(text).toBe(
      '📋 *Kế Hoạch Của Bạn:*\n\n' +
        '🔄 *1. Học Python*\n' +
        '   📅 10/03/2026 | Status: in_progress\n\n' +
        '✅ *2. Chạy 5km*\n' +
        '   📅 N/A | Status: completed\n\n',
    );
  });
});

describe('renderDocumentContext', () => {
  it('prefixes each document and separates them with a blank line', () => {
    expect(renderDocumentContext(['A', 'B'])).toBe('- A\n\n- B');
  });

  it('is an empty string when nothing matched', () => {
    expect(renderDocumentContext([])).toBe('');
  });
});

describe('renderWeeklyDigest', () => {
  it('numbers the goals before the tips', () => {
    const text = renderWeeklyDigest([
      { id: 'p1', chatId: '1', goal: 'Đọc sách', status: 'pending' },
      { id: 'p2', chatId: '1', goal: 'Tập yoga', status: 'pending' },
    ]);

    expect(text.startsWith('📋 *Kế Hoạch Tuần Này:*\n\n1. Đọc sách\n2. Tập yoga\n\n💡 *Gợi ý:*\n')).toBe(true);
    expect(text.endsWith('Chúc bạn một tuần thành công! 🚀')).toBe(true);
  });
});

describe('greetingForHour', () => {
  it('maps the four canonical hours', () => {
    expect(greetingForHour(6)).toBe('☀️ *Chào Buổi Sáng!*');
    expect(greetingForHour(12)).toBe('🌤️ *Nghỉ Trưa Rồi!*');
    expect(greetingForHour(18)).toBe('🌆 *Buổi Chiều Vui Vẻ!*');
    expect(greetingForHour(21)).toBe('🌙 *Buổi Tối An Lành!*');
  });

  it('falls back for any other hour', () => {
    expect(greetingForHour(9)).toBe(FALLBACK_GREETING);
  });
});

describe('renderDailyReminder', () => {
  it('combines greeting, goals and encouragement', () => {
    const text = renderDailyReminder(12, [
      { id: 'a', chatId: '1', goal: 'Học tiếng Anh', status: 'in_progress', createdAt: null },
    ]);

    expect(text).toBe(
      '🌤️ *Nghỉ Trưa Rồi!*\n\n📋 *Kế Hoạch Hôm Nay:*\n\n1. Học tiếng Anh\n\n💪 Hãy tiếp tục cố gắng nhé!',
    );
  });
});

describe('renderKeepAliveError', () => {
  it('truncates the error to 200 characters', () => {
    const text = renderKeepAliveError('x'.repeat(250));

    expect(text).toContain(`ping databases:\n${'x'.repeat(200)}\n\nVui lòng`);
  });

  it('counts an emoji as one character and never splits it', () => {
    const text = renderKeepAliveError(`${'x'.repeat(199)}🔥🔥`);

    expect(text).toContain(`ping databases:\n${'x'.repeat(199)}🔥\n\nVui lòng`);
  });
});
