/**
 * NoticeBanner - Inline message shown above the current view
 */

import * as React from 'react';
import type { Notice } from '../types';

interface NoticeBannerProps {
  notice: Notice;
}

export const NoticeBanner: React.FC<NoticeBannerProps> = ({ notice }) => {
  return (
    <div className={`notice notice-${notice.kind}`} role={notice.kind === 'error' ? 'alert' : 'status'}>
      {notice.message}
    </div>
  );
};
