import mongoose from 'mongoose';
import isEmail from 'validator/lib/isEmail';
import {WaitlistEntry} from '../interfaces/waitlist';

export const DEFAULT_CITY = 'Milano';
export const DEFAULT_SOURCE = 'landing';

const waitlistSchema = new mongoose.Schema<WaitlistEntry>(
  {
    email: {
      type: String,
      required: [true, 'Email is required'],
      unique: true,
      validate: [isEmail, 'Please enter a valid email'],
      lowercase: true,
      trim: true,
    },
    city: {
      type: String,
      default: DEFAULT_CITY,
    },
    source: {
      type: String,
      default: DEFAULT_SOURCE,
    },
    subscribed_at: {
      type: Date,
      required: [true, 'Please specify the subscription date'],
    },
    // only set when the same email signs up again
    updated_at: {
      type: Date,
    },
  },
  {collection: 'waitlist', versionKey: false}
);

const WAITLIST = mongoose.model<WaitlistEntry>('waitlist', waitlistSchema);

export default WAITLIST;
